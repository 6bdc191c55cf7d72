import {UnsolvableError} from '../game/errors';
import {Puzzle} from '../game/puzzle';
import {BaseSolver} from './solver';

/**
 * Solves a puzzle by depth-first search over the mutable fields, in row-major
 * order.  Instead of recursing, it keeps an index into the mutable fields:
 * each step either moves a cell to its next allowed digit and advances, or
 * blanks the cell and retreats.  Given enough tries it finds a solution if
 * there is one.
 */
export class BacktrackingSolver extends BaseSolver {
  protected override search(puzzle: Puzzle): void {
    const {grid} = puzzle;
    const locs = grid.mutableLocs;
    let index = 0;
    while (!puzzle.isDone()) {
      const loc = locs[index];
      if (loc === undefined) {
        throw new UnsolvableError(
          'The clues of this puzzle contradict each other',
        );
      }
      const current = grid.get(loc);
      const next = puzzle.fieldGuesses(loc).find(guess => guess > current);
      if (next === undefined) {
        grid.set(loc, 0);
        if (index === 0) {
          throw new UnsolvableError(
            `No digit fits at ${loc} on try ${this.tries + 1}; the puzzle has no solution`,
          );
        }
        --index;
      } else {
        grid.set(loc, next);
        ++index;
      }
      if (!this.countTry()) break;
    }
  }
}
