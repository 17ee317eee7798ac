/**
 * Quiz Session Model Tests
 */

import { QuizStateError } from './errors';
import {
  QuizResultEntry,
  createQuizSession,
  isTerminalState,
  isValidTransition,
  summarizeResults,
  transition,
} from './quiz-session.model';

function result(index: number, ok: boolean): QuizResultEntry {
  return {
    index,
    recordId: `r${index}`,
    source: 'geo',
    question: `Question ${index}?`,
    chosen: ok ? 'right' : 'wrong',
    correct: 'right',
    ok,
    hint: '',
    reference: '',
  };
}

describe('Quiz Session Model', () => {
  describe('isValidTransition', () => {
    it('should follow the question loop', () => {
      expect(isValidTransition('idle', 'presenting')).toBe(true);
      expect(isValidTransition('presenting', 'awaiting_answer')).toBe(true);
      expect(isValidTransition('awaiting_answer', 'scored')).toBe(true);
      expect(isValidTransition('scored', 'presenting')).toBe(true);
      expect(isValidTransition('scored', 'finished')).toBe(true);
    });

    it('should allow finishing while awaiting an answer', () => {
      expect(isValidTransition('awaiting_answer', 'finished')).toBe(true);
    });

    it('should reject skipping states', () => {
      expect(isValidTransition('idle', 'scored')).toBe(false);
      expect(isValidTransition('presenting', 'scored')).toBe(false);
      expect(isValidTransition('finished', 'presenting')).toBe(false);
    });
  });

  describe('isTerminalState', () => {
    it('should only treat finished as terminal', () => {
      expect(isTerminalState('finished')).toBe(true);
      expect(isTerminalState('scored')).toBe(false);
    });
  });

  describe('transition', () => {
    it('should move a new session forward', () => {
      const session = createQuizSession([], 4, new Date(0));
      expect(session.state).toBe('idle');

      transition(session, 'presenting');
      transition(session, 'awaiting_answer');

      expect(session.state).toBe('awaiting_answer');
    });

    it('should throw QuizStateError on an illegal move', () => {
      const session = createQuizSession([], 4, new Date(0));
      expect(() => transition(session, 'scored')).toThrow(QuizStateError);
      expect(() => transition(session, 'scored')).toThrow('Invalid quiz transition: idle -> scored');
      expect(session.state).toBe('idle');
    });
  });

  describe('summarizeResults', () => {
    it('should count right and wrong answers', () => {
      expect(summarizeResults([result(1, true), result(2, false), result(3, true), result(4, true)])).toEqual({
        total: 4,
        score: 3,
        wrong: 1,
        percent: 75,
      });
    });

    it('should report zero percent for no answers', () => {
      expect(summarizeResults([])).toEqual({ total: 0, score: 0, wrong: 0, percent: 0 });
    });
  });
});
