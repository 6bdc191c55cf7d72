/*
 * Sources of randomness for the stochastic solver.
 */

import {checkInt, checkIntRange} from '../game/ints';

/** Returns a uniformly distributed number in [0, 1), like `Math.random`. */
export type Random = () => number;

/**
 * A small seeded PRNG (mulberry32), for runs that must be repeatable.
 *
 * @param seed Any 32-bit integer.
 */
export function mulberry32(seed: number): Random {
  let a = checkInt(seed, 'seed') | 0;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Returns a uniformly distributed integer in 0..n. */
export function randomInt(random: Random, n: number): number {
  checkIntRange(n, 1, Number.MAX_SAFE_INTEGER, 'bound');
  return Math.min(Math.floor(random() * n), n - 1);
}

/** Shuffles an array in place (Fisher-Yates) and returns it. */
export function shuffle<T>(random: Random, array: T[]): T[] {
  for (let i = array.length - 1; i > 0; --i) {
    const j = randomInt(random, i + 1);
    [array[i], array[j]] = [array[j], array[i]];
  }
  return array;
}
