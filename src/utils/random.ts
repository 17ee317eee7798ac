/**
 * Injectable randomness
 *
 * Sampling and shuffling take an `Rng` so that tests can pin the sequence.
 */

import { randomInt } from 'crypto';

/** Returns a float in [0, 1) */
export type Rng = () => number;

export const defaultRng: Rng = () => randomInt(0, 2 ** 32) / 2 ** 32;

/**
 * Fisher-Yates shuffle; returns a new array
 */
export function shuffle<T>(items: readonly T[], rng: Rng = defaultRng): T[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * Uniform sample without replacement; returns min(count, items.length) items
 */
export function sample<T>(items: readonly T[], count: number, rng: Rng = defaultRng): T[] {
  if (count <= 0) {
    return [];
  }
  return shuffle(items, rng).slice(0, Math.min(count, items.length));
}

/**
 * Integer in [min, max], both inclusive
 */
export function randomIntInclusive(min: number, max: number, rng: Rng = defaultRng): number {
  return min + Math.floor(rng() * (max - min + 1));
}
