/**
 * The root of the errors this solver throws on purpose.  Anything else that
 * escapes is a bug.
 */
export class SudokuError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The puzzle text or digit rows could not be turned into a grid. */
export class MalformedInputError extends SudokuError {}

/** A grid was built from something other than 9 rows of 9 digits. */
export class InvalidDimensionsError extends MalformedInputError {}

/** A row, column, parcel, location or cell value was outside its range. */
export class OutOfBoundsError extends SudokuError {}

/**
 * A solver ran out of alternatives before running out of tries: the puzzle
 * has no solution.
 */
export class UnsolvableError extends SudokuError {}

/** The command line could not be understood. */
export class UsageError extends SudokuError {}

/** The puzzle file could not be read at all. */
export class InputFileError extends SudokuError {}
