/**
 * Distractor Service
 *
 * Builds the option set for one multiple-choice question: the correct answer
 * plus up to n-1 wrong answers drawn from other records.
 *
 * Selection order:
 * 1. Boolean question (matches a boolean keyword) -> the two boolean tokens.
 * 2. Question matches a grouping keyword -> prefer answers of other records
 *    whose question matches the same keyword, topped up from the full pool.
 * 3. Otherwise -> uniform sample from the full pool.
 *
 * Keyword lists come from configuration; nothing here is language specific.
 */

import type { KeywordConfig } from '../models/config.model';
import { QuestionRecord, normalizeText } from '../models/question-record.model';
import { Rng, defaultRng, sample, shuffle } from '../utils/random';

export type OptionSetMode = 'boolean' | 'single' | 'grouped' | 'random';

export interface OptionRequest {
  question: string;
  correctAnswer: string;
  /** Every answer that counts as correct for this question (the correct one included) */
  acceptedAnswers?: readonly string[];
  /** Records whose answers may serve as distractors */
  candidates: readonly QuestionRecord[];
  optionCount: number;
}

export interface OptionSet {
  options: string[];
  mode: OptionSetMode;
  /** Grouping keyword used, when mode is 'grouped' */
  keyword?: string;
}

function containsKeyword(text: string, keyword: string): boolean {
  return text.toLowerCase().includes(keyword.toLowerCase());
}

/**
 * First boolean keyword found in the question, if any
 */
export function matchBooleanKeyword(question: string, keywords: KeywordConfig): string | undefined {
  return keywords.booleanKeywords.find(keyword => containsKeyword(question, keyword));
}

/**
 * Most specific (longest) grouping keyword found in the question, if any
 */
export function matchGroupingKeyword(question: string, keywords: KeywordConfig): string | undefined {
  let best: string | undefined;
  for (const keyword of keywords.groupingKeywords) {
    if (containsKeyword(question, keyword) && (!best || keyword.length > best.length)) {
      best = keyword;
    }
  }
  return best;
}

/**
 * Distinct answers from `records`, skipping excluded (normalized) texts
 */
function answerPool(records: readonly QuestionRecord[], excluded: ReadonlySet<string>): string[] {
  const seen = new Set(excluded);
  const pool: string[] = [];
  for (const record of records) {
    const key = normalizeText(record.answer);
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    pool.push(record.answer);
  }
  return pool;
}

export function buildOptions(
  request: OptionRequest,
  keywords: KeywordConfig,
  rng: Rng = defaultRng
): OptionSet {
  if (matchBooleanKeyword(request.question, keywords)) {
    return { options: [keywords.booleanTokens.true, keywords.booleanTokens.false], mode: 'boolean' };
  }

  const wanted = Math.max(0, request.optionCount - 1);
  if (wanted === 0) {
    return { options: [request.correctAnswer], mode: 'single' };
  }

  const excluded = new Set(
    [
      request.correctAnswer,
      ...(request.acceptedAnswers ?? []),
      keywords.booleanTokens.true,
      keywords.booleanTokens.false,
      ...keywords.excludedTokens,
    ].map(text => normalizeText(text))
  );

  const keyword = matchGroupingKeyword(request.question, keywords);
  let distractors: string[] = [];
  if (keyword) {
    const related = request.candidates.filter(record => containsKeyword(record.question, keyword));
    distractors = sample(answerPool(related, excluded), wanted, rng);
  }

  if (distractors.length < wanted) {
    const taken = new Set([...excluded, ...distractors.map(text => normalizeText(text))]);
    distractors.push(...sample(answerPool(request.candidates, taken), wanted - distractors.length, rng));
  }

  return {
    options: shuffle([request.correctAnswer, ...distractors], rng),
    mode: keyword ? 'grouped' : 'random',
    keyword,
  };
}
