/**
 * Quiz Session Model
 *
 * Ephemeral state of one play run. Lives only until the report is exported.
 *
 *   idle -> presenting(i) -> awaiting_answer(i) -> scored(i) -> presenting(i+1) | finished
 *
 * The exit token is honoured in awaiting_answer and jumps straight to
 * finished with the results gathered so far.
 */

import { randomUUID } from 'crypto';

import { QuizStateError } from './errors';
import { QuestionRecord } from './question-record.model';

// ─────────────────────────────────────────────────────────────────────────────
// State machine
// ─────────────────────────────────────────────────────────────────────────────

export type QuizSessionState =
  | 'idle' // Created, nothing shown yet
  | 'presenting' // Rendering question `cursor`
  | 'awaiting_answer' // Blocked on one line of input
  | 'scored' // Answer compared, result appended
  | 'finished'; // Pool exhausted or exit requested

export const VALID_TRANSITIONS: Record<QuizSessionState, QuizSessionState[]> = {
  idle: ['presenting', 'finished'],
  presenting: ['awaiting_answer'],
  awaiting_answer: ['scored', 'finished'],
  scored: ['presenting', 'finished'],
  finished: [], // Terminal
};

export function isValidTransition(from: QuizSessionState, to: QuizSessionState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: QuizSessionState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}

// ─────────────────────────────────────────────────────────────────────────────
// Session
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Outcome of one answered question
 */
export interface QuizResultEntry {
  /** 1-based position in the session */
  index: number;
  recordId: string;
  source: string;
  question: string;
  chosen: string;
  correct: string;
  ok: boolean;
  hint: string;
  reference: string;
}

export interface QuizSession {
  id: string;
  state: QuizSessionState;
  pool: QuestionRecord[];
  /** Index into `pool` of the current question */
  cursor: number;
  optionCount: number;
  score: number;
  results: QuizResultEntry[];
  /** Exit token received before the pool ran out */
  aborted: boolean;
  startedAt: Date;
}

export interface QuizSummary {
  total: number;
  score: number;
  wrong: number;
  /** 0-100, one decimal when rendered */
  percent: number;
  user: string;
  startedAt: Date;
  finishedAt: Date;
  aborted: boolean;
}

export function createQuizSession(pool: QuestionRecord[], optionCount: number, startedAt = new Date()): QuizSession {
  return {
    id: randomUUID(),
    state: 'idle',
    pool,
    cursor: 0,
    optionCount,
    score: 0,
    results: [],
    aborted: false,
    startedAt,
  };
}

/**
 * Move the session to `to`, or throw on an illegal transition
 */
export function transition(session: QuizSession, to: QuizSessionState): void {
  if (!isValidTransition(session.state, to)) {
    throw new QuizStateError(session.state, to);
  }
  session.state = to;
}

/**
 * Totals over the answered questions
 */
export function summarizeResults(
  results: readonly QuizResultEntry[]
): Pick<QuizSummary, 'total' | 'score' | 'wrong' | 'percent'> {
  const total = results.length;
  const score = results.filter(result => result.ok).length;
  return {
    total,
    score,
    wrong: total - score,
    percent: total > 0 ? (score / total) * 100 : 0,
  };
}
