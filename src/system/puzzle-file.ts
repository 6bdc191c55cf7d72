/*
 * Reading puzzles from text files.
 *
 * A puzzle file has one line per grid row.  Lines containing `#` are comments
 * and lines containing `-` separate groups of rows; both are skipped, as are
 * blank lines.  In the remaining lines `|` separates groups of columns and is
 * ignored, and `x` marks a blank cell.  For example:
 *
 *     # An easy one
 *     x53|284|91x
 *     6x9|537|824
 *     ...
 */

import {readFile} from 'node:fs/promises';
import {InputFileError, MalformedInputError} from '../game/errors';
import {Puzzle} from '../game/puzzle';

const BLANK = 'x';

/**
 * Turns the text of a puzzle file into 9 rows of 9 digits, 0 meaning blank.
 *
 * @throws MalformedInputError if a row has the wrong length or a character
 *     other than a digit or `x`, or if there aren't exactly 9 rows.
 */
export function parsePuzzleText(text: string): number[][] {
  const rows: number[][] = [];
  text.split('\n').forEach((rawLine, i) => {
    const lineNumber = i + 1;
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.includes('#') || line.includes('-') || line.trim() === '') {
      return;
    }
    const cells = [...line.replaceAll('|', '')];
    if (cells.length !== 9) {
      throw new MalformedInputError(
        `Line ${lineNumber}: expected 9 cells, got ${cells.length}`,
      );
    }
    rows.push(cells.map(ch => parseCell(ch, lineNumber)));
  });
  if (rows.length !== 9) {
    throw new MalformedInputError(`Expected 9 rows, got ${rows.length}`);
  }
  return rows;
}

function parseCell(ch: string, lineNumber: number): number {
  if (ch === BLANK) return 0;
  if (ch >= '0' && ch <= '9') return Number(ch);
  throw new MalformedInputError(
    `Line ${lineNumber}: ${JSON.stringify(ch)} is not a digit`,
  );
}

/**
 * Reads a puzzle file.
 *
 * @throws InputFileError if the file can't be read.
 * @throws MalformedInputError if its contents aren't a puzzle.
 */
export async function readPuzzleFile(path: string): Promise<Puzzle> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new InputFileError(`Could not read ${path}: ${reason}`);
  }
  return Puzzle.fromRows(parsePuzzleText(text));
}
