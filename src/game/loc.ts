import {checkIntRange} from './ints';
import {iota} from './iota';

/**
 * Identifies one cell of a Sudoku grid.  There is exactly one Loc per cell, so
 * locations can be compared with `===` and used as Set or Map keys.
 */
export class Loc extends Object {
  /** The row index, in 0..9. */
  readonly row: number;
  /** The column index, in 0..9. */
  readonly col: number;
  /** The location index, in 0..81; orders locations row-major. */
  readonly index: number;
  /** The index of the 3x3 parcel containing this location, in 0..9. */
  readonly parcel: number;

  private constructor(index: number) {
    super();
    this.index = index;
    this.row = Math.floor(index / 9);
    this.col = index % 9;
    this.parcel = parcelIndex(this.row, this.col);
  }

  /** The location as a 0-based (row,col) pair. */
  override toString(): string {
    return `(${this.row},${this.col})`;
  }

  /**
   * The 81 locations of a Sudoku grid, in row-major order.
   */
  static readonly ALL: readonly Loc[] = iota(81).map(i => new Loc(i));

  /** Converts a location index into a Loc. */
  static of(index: number): Loc;

  /** Converts a row-column pair into a Loc. */
  static of(row: number, col: number): Loc;

  static of(rowOrIndex: number, col?: number): Loc {
    if (col === undefined) {
      return Loc.ALL[checkIntRange(rowOrIndex, 0, 81, 'location index')];
    }
    const row = checkIntRange(rowOrIndex, 0, 9, 'row');
    const index = row * 9 + checkIntRange(col, 0, 9, 'column');
    return Loc.ALL[index];
  }

  /**
   * Returns the 9 locations of the given parcel, in row-major order.  Parcels
   * are themselves numbered row-major, 0 at the top left.
   */
  static parcel(parcel: number): readonly Loc[] {
    return PARCELS[checkIntRange(parcel, 0, 9, 'parcel')];
  }

  /** Orders locations row-major, for use with `Array.prototype.sort`. */
  static compare(a: Loc, b: Loc): number {
    return a.index - b.index;
  }
}

/** The parcel index of a row-column pair. */
export function parcelIndex(row: number, col: number): number {
  return Math.floor(row / 3) * 3 + Math.floor(col / 3);
}

const PARCELS: readonly (readonly Loc[])[] = iota(9).map(parcel =>
  Loc.ALL.filter(loc => loc.parcel === parcel),
);
