// Functions for checking integers.

import {OutOfBoundsError} from './errors';

/**
 * Ensures that a given number is an integer.
 *
 * @param n The number to check.
 * @param what What the number stands for, used in the error message.
 * @returns `n`, if it is an integer.
 * @throws OutOfBoundsError if `n` is not an integer.
 */
export function checkInt(n: number, what = 'value'): number {
  if (!Number.isInteger(n)) {
    throw new OutOfBoundsError(`${what} ${n} is not an integer`);
  }
  return n;
}

/**
 * Ensures that a given number is an integer in a given range.
 *
 * @param n The number to check.
 * @param lo The lower bound, inclusive.
 * @param hi The upper bound, exclusive.
 * @param what What the number stands for, used in the error message.
 * @returns `n`, if it is an integer in the given range.
 * @throws OutOfBoundsError if `n` is not an integer or outside the range.
 */
export function checkIntRange(
  n: number,
  lo: number,
  hi: number,
  what = 'value',
): number {
  checkInt(n, what);
  if (n < lo || n >= hi) {
    throw new OutOfBoundsError(`${what} ${n} out of range ${lo}..${hi}`);
  }
  return n;
}

/** Tells whether `n` is a Sudoku cell value: 0 for blank, or 1..=9. */
export function isCellValue(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n <= 9;
}
