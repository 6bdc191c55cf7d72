import {checkIntRange} from '../game/ints';
import {Puzzle} from '../game/puzzle';
import {Logger} from '../system/logger';

/**
 * The algorithms available for solving a puzzle.  The values are the names
 * accepted on the command line.
 */
export enum SolverAlgorithm {
  BACKTRACING = 'backtracing',
  MONTECARLO = 'montecarlo',
}

/**
 * A strategy for solving a puzzle within a budget of tries.  Each instance
 * solves one puzzle.
 */
export interface Solver {
  /**
   * Works on the puzzle until it is done or the budget runs out, and returns
   * it.  The puzzle is changed in place; if the budget ran out, its grid is in
   * whatever intermediate state the search had reached.
   */
  solve(puzzle: Puzzle): Puzzle;

  /** Tells whether `solve` finished before using up the budget. */
  isSuccess(): boolean;

  /** How many search steps `solve` took. */
  readonly tries: number;
}

/** Settings shared by every solver. */
export interface SolverOptions {
  /** The most search steps to take; at least 1. */
  readonly maxTries: number;
  /** Where to report progress.  Silent by default. */
  readonly logger?: Logger;
}

/**
 * Keeps the try count and budget for a solver, so that subclasses only have
 * to implement the search itself.
 */
export abstract class BaseSolver implements Solver {
  readonly maxTries: number;
  protected readonly logger: Logger;
  private triesState = 0;
  private used = false;

  constructor(options: SolverOptions) {
    this.maxTries = checkIntRange(
      options.maxTries,
      1,
      Number.MAX_SAFE_INTEGER,
      'max tries',
    );
    this.logger = options.logger ?? Logger.silent();
  }

  get tries(): number {
    return this.triesState;
  }

  isSuccess(): boolean {
    return this.triesState < this.maxTries;
  }

  solve(puzzle: Puzzle): Puzzle {
    if (this.used) {
      throw new Error(`${this.constructor.name} has already been used`);
    }
    this.used = true;
    this.search(puzzle);
    this.logger.debug(
      `${this.constructor.name} stopped after ${this.tries} of at most ${this.maxTries} tries`,
    );
    return puzzle;
  }

  /**
   * Counts one search step, and tells whether the budget allows another.
   */
  protected countTry(): boolean {
    return ++this.triesState < this.maxTries;
  }

  /** Runs the search, calling `countTry` after every step. */
  protected abstract search(puzzle: Puzzle): void;
}
