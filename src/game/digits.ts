// Constraint checks over collections of cell values.

import {DIGITS} from './iota';

/**
 * Tells whether the given values contain no repeated digit.  Zeros are blank
 * cells and may repeat freely.
 */
export function hasOnlyUniqueDigits(values: Iterable<number>): boolean {
  const nonzero = [...values].filter(v => v !== 0);
  return new Set(nonzero).size === nonzero.length;
}

/**
 * Returns, in ascending order, the digits 1..=9 that do not occur in the given
 * values.
 */
export function missingDigits(values: Iterable<number>): number[] {
  const seen = new Set(values);
  return DIGITS.filter(d => !seen.has(d));
}

/** Counts the distinct values, treating 0 as a value like any other. */
export function countDistinct(values: Iterable<number>): number {
  return new Set(values).size;
}
