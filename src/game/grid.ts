import {InvalidDimensionsError} from './errors';
import {checkIntRange, isCellValue} from './ints';
import {iota} from './iota';
import {Loc} from './loc';

/** Rows of cell values, 0 meaning blank: the raw form of a grid. */
export type DigitRows = readonly (readonly number[])[];

/**
 * A 9x9 Sudoku grid.  Each cell holds 0, meaning blank, or a numeral 1..=9.
 *
 * The cells that were blank when the grid was built are its mutable fields:
 * the only cells a solver may change, and the order in which the backtracking
 * solver visits them.  They are fixed at construction.
 */
export class Grid {
  private readonly array: Uint8Array;
  private readonly mutable: ReadonlySet<Loc>;

  /** The locations that were blank at construction, in row-major order. */
  readonly mutableLocs: readonly Loc[];

  /**
   * Builds a grid from 9 rows of 9 cell values.
   *
   * @throws InvalidDimensionsError if the shape is wrong or a value is not in
   *     0..=9.
   */
  constructor(rows: DigitRows);

  /** Duplicates a grid, keeping its mutable fields. */
  constructor(grid: Grid);

  constructor(source: DigitRows | Grid) {
    if (source instanceof Grid) {
      this.array = new Uint8Array(source.array);
      this.mutableLocs = source.mutableLocs;
    } else {
      this.array = toArray(source);
      this.mutableLocs = Loc.ALL.filter(loc => this.array[loc.index] === 0);
    }
    this.mutable = new Set(this.mutableLocs);
  }

  /** Makes a grid with every cell blank, and so every cell mutable. */
  static empty(): Grid {
    return new Grid(iota(9).map(() => iota(9).map(() => 0)));
  }

  /** Returns an independent copy of this grid. */
  clone(): Grid {
    return new Grid(this);
  }

  /** Returns the value at the given location, 0 if blank. */
  get(loc: Loc): number {
    return this.array[loc.index];
  }

  /**
   * Assigns a value to the given location; 0 clears it.
   *
   * @throws OutOfBoundsError if the value is not in 0..=9.
   */
  set(loc: Loc, value: number): void {
    this.array[loc.index] = checkIntRange(value, 0, 10, 'cell value');
  }

  /** Tells whether the location was blank when the grid was built. */
  isMutable(loc: Loc): boolean {
    return this.mutable.has(loc);
  }

  /** Returns the 9 values of the given row, left to right. */
  getRow(row: number): number[] {
    checkIntRange(row, 0, 9, 'row');
    return Array.from(this.array.subarray(row * 9, row * 9 + 9));
  }

  /** Returns the 9 values of the given column, top to bottom. */
  getCol(col: number): number[] {
    checkIntRange(col, 0, 9, 'column');
    return iota(9).map(row => this.array[row * 9 + col]);
  }

  /**
   * Returns the 3x3 block of the given parcel, indexed by row offset and then
   * column offset.
   */
  getParcel(parcel: number): number[][] {
    checkIntRange(parcel, 0, 9, 'parcel');
    const startRow = Math.floor(parcel / 3) * 3;
    const startCol = (parcel % 3) * 3;
    const block = iota(3).map(() => [0, 0, 0]);
    for (let c = 0; c < 3; ++c) {
      for (let r = 0; r < 3; ++r) {
        block[r][c] = this.get(Loc.of(startRow + r, startCol + c));
      }
    }
    return block;
  }

  /** Returns the 9 values of the given parcel, row-major. */
  getParcelValues(parcel: number): number[] {
    return this.getParcel(parcel).flat();
  }

  /** Returns the mutable fields that lie in the given parcel, row-major. */
  mutableLocsOfParcel(parcel: number): Loc[] {
    return Loc.parcel(parcel).filter(loc => this.mutable.has(loc));
  }

  /** Blanks every mutable field, leaving the clues alone. */
  reset(): void {
    for (const loc of this.mutableLocs) {
      this.array[loc.index] = 0;
    }
  }

  /** Returns the cell values as 9 rows of 9. */
  toRows(): number[][] {
    return iota(9).map(row => this.getRow(row));
  }

  /**
   * Returns an ASCII-art version of this grid: blanks as `x`, a `|` between
   * column groups and a line of dashes between row groups.
   */
  toString(): string {
    const lines: string[] = [];
    for (let row = 0; row < 9; ++row) {
      if (row > 0 && row % 3 === 0) lines.push('-'.repeat(11));
      let line = '';
      for (let col = 0; col < 9; ++col) {
        if (col > 0 && col % 3 === 0) line += '|';
        const value = this.array[row * 9 + col];
        line += value === 0 ? 'x' : String(value);
      }
      lines.push(line);
    }
    return lines.join('\n');
  }
}

/** A Grid that you can't modify. */
export type ReadonlyGrid = Omit<Grid, 'set' | 'reset'>;

function toArray(rows: DigitRows): Uint8Array {
  if (rows.length !== 9) {
    throw new InvalidDimensionsError(`Expected 9 rows, got ${rows.length}`);
  }
  const array = new Uint8Array(81);
  rows.forEach((values, row) => {
    if (values.length !== 9) {
      throw new InvalidDimensionsError(
        `Expected 9 columns in row ${row}, got ${values.length}`,
      );
    }
    values.forEach((value, col) => {
      if (!isCellValue(value)) {
        throw new InvalidDimensionsError(
          `Value ${value} at ${Loc.of(row, col)} is not in 0..=9`,
        );
      }
      array[row * 9 + col] = value;
    });
  });
  return array;
}
