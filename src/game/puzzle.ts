import {hasOnlyUniqueDigits, missingDigits} from './digits';
import {DigitRows, Grid, ReadonlyGrid} from './grid';
import {iota} from './iota';
import {Loc} from './loc';

/**
 * A Sudoku puzzle being solved.  Owns one grid, which the solvers fill in
 * place.
 *
 * Naming:
 *  - valid: no digit repeats within a parcel (blanks don't count)
 *  - done: every mutable field is filled and the puzzle is valid
 */
export class Puzzle {
  private current: Grid;

  /**
   * Makes a puzzle around the given grid, or around an empty grid to be
   * replaced by `read`.
   */
  constructor(grid: Grid = Grid.empty()) {
    this.current = grid;
  }

  /** Makes a puzzle from rows of digits. */
  static fromRows(rows: DigitRows): Puzzle {
    const puzzle = new Puzzle();
    puzzle.read(rows);
    return puzzle;
  }

  /** The grid being solved. */
  get grid(): Grid {
    return this.current;
  }

  /**
   * Replaces the grid with one built from the given rows of digits, 0 meaning
   * blank.  The blank cells become the new mutable fields.
   *
   * @throws InvalidDimensionsError, a MalformedInputError, if there aren't 9
   *     rows of 9 digits.
   */
  read(rows: DigitRows): void {
    this.current = new Grid(rows);
  }

  isValidRow(row: number): boolean {
    return hasOnlyUniqueDigits(this.current.getRow(row));
  }

  isValidCol(col: number): boolean {
    return hasOnlyUniqueDigits(this.current.getCol(col));
  }

  isValidParcel(parcel: number): boolean {
    return hasOnlyUniqueDigits(this.current.getParcelValues(parcel));
  }

  /** Tells whether the row, column and parcel of the given cell are valid. */
  isValidLoc(loc: Loc): boolean {
    return (
      this.isValidRow(loc.row) &&
      this.isValidCol(loc.col) &&
      this.isValidParcel(loc.parcel)
    );
  }

  /**
   * Tells whether every parcel is valid.  Rows and columns are not checked:
   * the backtracking solver only ever places digits its row and column allow.
   */
  isValid(): boolean {
    return iota(9).every(parcel => this.isValidParcel(parcel));
  }

  /** Tells whether every mutable field is filled and the puzzle is valid. */
  isDone(): boolean {
    const grid = this.current;
    return grid.mutableLocs.every(loc => grid.get(loc) !== 0) && this.isValid();
  }

  /**
   * Returns, in ascending order, the digits that appear in none of the given
   * cell's row, column or parcel.
   */
  fieldGuesses(loc: Loc): number[] {
    const grid = this.current;
    return missingDigits([
      ...grid.getRow(loc.row),
      ...grid.getCol(loc.col),
      ...grid.getParcelValues(loc.parcel),
    ]);
  }

  /** Returns a copy of the grid with every mutable field blanked. */
  unsolved(): ReadonlyGrid {
    const grid = this.current.clone();
    grid.reset();
    return grid;
  }

  /**
   * Renders the grid.  With `showUnsolved`, each line of the unsolved grid is
   * followed on the same line by an arrow and the current line.
   */
  render(showUnsolved = false): string {
    const solved = this.current.toString();
    if (!showUnsolved) return solved;
    const solvedLines = solved.split('\n');
    return this.unsolved()
      .toString()
      .split('\n')
      .map((line, i) => `${line} -> ${solvedLines[i]}`)
      .join('\n');
  }

  toString(): string {
    return this.current.toString();
  }
}
