/**
 * Quiz Pool Service
 *
 * Chooses which records a session asks, and how many options each gets.
 */

import type { OptionCount } from '../models/config.model';
import { QuestionRecord } from '../models/question-record.model';
import { Rng, defaultRng, randomIntInclusive, sample, shuffle } from '../utils/random';

/**
 * Build the session pool.
 *
 * - no limit (undefined or <= 0): every record, shuffled
 * - limit <= records: uniform sample without replacement
 * - limit > records: the records repeated, each copy reshuffled, cut to the limit
 */
export function buildPool(
  records: readonly QuestionRecord[],
  maxQuestions?: number,
  rng: Rng = defaultRng
): QuestionRecord[] {
  if (records.length === 0) {
    return [];
  }
  if (maxQuestions === undefined || maxQuestions <= 0) {
    return shuffle(records, rng);
  }
  if (maxQuestions <= records.length) {
    return sample(records, maxQuestions, rng);
  }

  const pool: QuestionRecord[] = [];
  while (pool.length < maxQuestions) {
    pool.push(...shuffle(records, rng));
  }
  return pool.slice(0, maxQuestions);
}

/**
 * Fixed option count, or one draw from a configured range
 */
export function resolveOptionCount(optionCount: OptionCount, rng: Rng = defaultRng): number {
  if (typeof optionCount === 'number') {
    return optionCount;
  }
  return randomIntInclusive(optionCount.min, optionCount.max, rng);
}
