import {join} from 'node:path';

/** Parses rows written as strings of 9 digits. */
export function rowsOf(lines: readonly string[]): number[][] {
  return lines.map(line => [...line].map(Number));
}

/** The path of a file in the repository's puzzles/ directory. */
export function puzzlePath(name: string): string {
  return join(__dirname, '..', '..', 'puzzles', name);
}

/** The clues of puzzles/example.txt. */
export const EXAMPLE = rowsOf([
  '703280906',
  '000530820',
  '008006300',
  '000620070',
  '001003268',
  '802010500',
  '000000001',
  '200070085',
  '030845600',
]);

/** The unique solution of EXAMPLE. */
export const SOLUTION = rowsOf([
  '753284916',
  '619537824',
  '428196357',
  '345628179',
  '971453268',
  '862719543',
  '584962731',
  '296371485',
  '137845692',
]);

/** SOLUTION with twelve cells blanked: puzzles/nearly-solved.txt. */
export const NEARLY_SOLVED = rowsOf([
  '053284910',
  '609537824',
  '428196307',
  '345020179',
  '971403268',
  '862019543',
  '504962731',
  '296371085',
  '037845690',
]);

/** EXAMPLE as rendered by `Grid.toString`. */
export const EXAMPLE_TEXT = `7x3|28x|9x6
xxx|53x|82x
xx8|xx6|3xx
-----------
xxx|62x|x7x
xx1|xx3|268
8x2|x1x|5xx
-----------
xxx|xxx|xx1
2xx|x7x|x85
x3x|845|6xx`;

/** SOLUTION as rendered by `Grid.toString`. */
export const SOLUTION_TEXT = `753|284|916
619|537|824
428|196|357
-----------
345|628|179
971|453|268
862|719|543
-----------
584|962|731
296|371|485
137|845|692`;
