/**
 * Distractor Service Tests
 */

import type { KeywordConfig } from '../models/config.model';
import { QuestionRecord, normalizeText } from '../models/question-record.model';
import { buildOptions, matchBooleanKeyword, matchGroupingKeyword } from './distractor.service';

const keywords: KeywordConfig = {
  booleanTokens: { true: 'Đúng', false: 'Sai' },
  excludedTokens: ['Đúng', 'Sai'],
  booleanKeywords: ['đúng hay sai'],
  groupingKeywords: ['which port', 'which layer', 'what is', 'what is the main function'],
};

let nextId = 0;

function card(question: string, answer: string): QuestionRecord {
  nextId++;
  return { id: `r${nextId}`, question, answer, hint: '', reference: '', source: 'net' };
}

const ports = [
  card('Which port does SSH use?', '22'),
  card('Which port does DNS use?', '53'),
  card('Which port does HTTP use?', '80'),
];

const others = [
  card('Which layer routes packets?', 'Network'),
  card('Which layer frames bits?', 'Data link'),
  card('Reliable transport protocol?', 'TCP'),
  card('Connectionless transport protocol?', 'UDP'),
];

const everything = [...ports, ...others];

describe('Distractor Service', () => {
  describe('matchBooleanKeyword', () => {
    it('should match case-insensitively', () => {
      expect(matchBooleanKeyword('Phát biểu sau ĐÚNG HAY SAI?', keywords)).toBe('đúng hay sai');
    });

    it('should return undefined without a match', () => {
      expect(matchBooleanKeyword('Which port does SSH use?', keywords)).toBeUndefined();
    });
  });

  describe('matchGroupingKeyword', () => {
    it('should prefer the longest matching keyword', () => {
      expect(matchGroupingKeyword('What is the main function of a router?', keywords)).toBe(
        'what is the main function'
      );
      expect(matchGroupingKeyword('What is a router?', keywords)).toBe('what is');
    });
  });

  describe('buildOptions', () => {
    it('should return the boolean tokens for a true/false question', () => {
      const set = buildOptions(
        { question: 'TCP is reliable, đúng hay sai?', correctAnswer: 'Đúng', candidates: everything, optionCount: 4 },
        keywords
      );

      expect(set).toEqual({ options: ['Đúng', 'Sai'], mode: 'boolean' });
    });

    it('should return only the correct answer for a single-option quiz', () => {
      const set = buildOptions(
        { question: 'Reliable transport protocol?', correctAnswer: 'TCP', candidates: everything, optionCount: 1 },
        keywords
      );

      expect(set).toEqual({ options: ['TCP'], mode: 'single' });
    });

    it('should return exactly n distinct options including the correct one', () => {
      const set = buildOptions(
        { question: 'Reliable transport protocol?', correctAnswer: 'TCP', candidates: everything, optionCount: 4 },
        keywords
      );

      expect(set.mode).toBe('random');
      expect(set.options).toHaveLength(4);
      expect(set.options.filter(option => option === 'TCP')).toHaveLength(1);
      expect(new Set(set.options.map(option => normalizeText(option))).size).toBe(4);
    });

    it('should draw distractors from questions sharing the grouping keyword', () => {
      const set = buildOptions(
        { question: 'Which port does SSH use?', correctAnswer: '22', candidates: everything, optionCount: 3 },
        keywords
      );

      expect(set.mode).toBe('grouped');
      expect(set.keyword).toBe('which port');
      expect([...set.options].sort()).toEqual(['22', '53', '80']);
    });

    it('should top up from the full pool when the group is too small', () => {
      const set = buildOptions(
        { question: 'Which port does SSH use?', correctAnswer: '22', candidates: everything, optionCount: 5 },
        keywords
      );

      expect(set.options).toHaveLength(5);
      expect(set.options).toEqual(expect.arrayContaining(['22', '53', '80']));
    });

    it('should never offer an accepted answer or a boolean token as a distractor', () => {
      const candidates = [
        card('Capital of France?', 'Paris'),
        card('Capital of France?', 'Lutetia'),
        card('Old name?', 'PARIS'),
        card('Is it?', 'Sai'),
        card('Capital of Norway?', 'Oslo'),
        card('Capital of Italy?', 'Rome'),
      ];

      const set = buildOptions(
        {
          question: 'Capital of France?',
          correctAnswer: 'Paris',
          acceptedAnswers: ['Paris', 'Lutetia'],
          candidates,
          optionCount: 10,
        },
        keywords
      );

      expect([...set.options].sort()).toEqual(['Oslo', 'Paris', 'Rome']);
    });

    it('should return fewer options when the pool is small', () => {
      const set = buildOptions(
        { question: 'Reliable transport protocol?', correctAnswer: 'TCP', candidates: [others[2], others[3]], optionCount: 6 },
        keywords
      );

      expect([...set.options].sort()).toEqual(['TCP', 'UDP']);
    });

    it('should use the injected rng for ordering', () => {
      const request = {
        question: 'Which port does SSH use?',
        correctAnswer: '22',
        candidates: ports,
        optionCount: 3,
      };
      const first = buildOptions(request, keywords, () => 0);
      const second = buildOptions(request, keywords, () => 0);

      expect(first.options).toEqual(second.options);
    });
  });
});
