import {missingDigits} from '../game/digits';
import {OutOfBoundsError, UnsolvableError} from '../game/errors';
import {Grid} from '../game/grid';
import {Puzzle} from '../game/puzzle';
import {calcEnergy} from './energy';
import {Random, randomInt, shuffle} from './random';
import {BaseSolver, SolverOptions} from './solver';

/** The temperature used when none is given. */
export const DEFAULT_TEMPERATURE = 0.15;

/** Settings for the Monte Carlo solver. */
export interface MonteCarloOptions extends SolverOptions {
  /**
   * How readily a swap that raises the energy is accepted.  Must be positive.
   */
  readonly temperature?: number;
  /** The source of randomness; `Math.random` by default. */
  readonly random?: Random;
}

/**
 * Fills each parcel's mutable fields, in row-major order, with the digits the
 * parcel lacks, in ascending order.  Afterwards every parcel holds each digit
 * exactly once.
 *
 * @throws UnsolvableError if a parcel's clues repeat a digit.
 */
export function fillParcels(grid: Grid): void {
  for (let parcel = 0; parcel < 9; ++parcel) {
    const locs = grid.mutableLocsOfParcel(parcel);
    for (const loc of locs) grid.set(loc, 0);
    const missing = missingDigits(grid.getParcelValues(parcel));
    if (missing.length !== locs.length) {
      throw new UnsolvableError(`Parcel ${parcel} has a repeated clue`);
    }
    locs.forEach((loc, i) => grid.set(loc, missing[i]));
  }
}

/**
 * Solves a puzzle by simulated annealing.  After filling every parcel with a
 * permutation of 1..=9, each step swaps two mutable cells of a random parcel,
 * keeping the swap if it doesn't raise the energy, and otherwise keeping it
 * with probability `exp(-increase / temperature)`.  Swaps within a parcel
 * never break the parcel, so only rows and columns contribute energy.
 *
 * There's no guarantee of finding a solution in any number of tries.
 */
export class MonteCarloSolver extends BaseSolver {
  readonly temperature: number;
  private readonly random: Random;

  constructor(options: MonteCarloOptions) {
    super(options);
    const {temperature = DEFAULT_TEMPERATURE, random = Math.random} = options;
    if (!(temperature > 0)) {
      throw new OutOfBoundsError(
        `Temperature must be positive, got ${temperature}`,
      );
    }
    this.temperature = temperature;
    this.random = random;
  }

  protected override search(puzzle: Puzzle): void {
    const {grid} = puzzle;
    fillParcels(grid);
    let energyLast = calcEnergy(grid);
    this.logger.debug(`Energy after filling the parcels: ${energyLast}`);

    while (!(energyLast === 0 && puzzle.isDone())) {
      const parcel = randomInt(this.random, 9);
      const locs = shuffle(this.random, grid.mutableLocsOfParcel(parcel));
      if (locs.length >= 2) {
        const [a, b] = locs;
        const valueA = grid.get(a);
        const valueB = grid.get(b);
        grid.set(a, valueB);
        grid.set(b, valueA);

        const energy = calcEnergy(grid);
        if (energy <= energyLast || this.accepts(energyLast - energy)) {
          energyLast = energy;
        } else {
          grid.set(a, valueA);
          grid.set(b, valueB);
        }
      }
      if (!this.countTry()) break;
    }
  }

  /** Decides whether to keep a swap that changed the energy by `delta` < 0. */
  private accepts(delta: number): boolean {
    return Math.exp(delta / this.temperature) >= this.random();
  }
}
