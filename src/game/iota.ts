/*
 * Functions to produce sequences of consecutive integers.
 */

import {checkInt} from './ints';

/**
 * A generator that produces `n` consecutive integers.
 *
 * @param n How many integers to produce.
 * @param start The first integer.
 * @throws OutOfBoundsError if `n` or `start` is not an integer.
 */
export function* iotaGenerator(n: number, start = 0) {
  checkInt(n, 'count');
  checkInt(start, 'start');
  for (let i = 0; i < n; ++i) {
    yield start + i;
  }
}

/**
 * Returns an array of `n` consecutive integers, counting from `start`.
 *
 * @param n How many integers to produce.
 * @param start The first integer, 0 by default.
 */
export function iota(n: number, start = 0): number[] {
  return [...iotaGenerator(n, start)];
}

/** The Sudoku numerals, 1 through 9. */
export const DIGITS: readonly number[] = iota(9, 1);
