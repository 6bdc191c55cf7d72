import {UnsolvableError} from '../game/errors';
import {EXAMPLE, NEARLY_SOLVED, rowsOf, SOLUTION} from '../game/fake-data';
import {Grid} from '../game/grid';
import {Puzzle} from '../game/puzzle';
import {calcEnergy} from './energy';
import {
  DEFAULT_TEMPERATURE,
  fillParcels,
  MonteCarloSolver,
} from './montecarlo';
import {mulberry32} from './random';

const DIGITS = [1, 2, 3, 4, 5, 6, 7, 8, 9];

/**
 * SOLUTION with two cells blanked in parcel 0, which the parcel fill puts back
 * in place, and two in parcel 4, which it puts back swapped.
 */
const TWO_PARCELS = SOLUTION.map(row => [...row]);
TWO_PARCELS[0][0] = 0;
TWO_PARCELS[2][2] = 0;
TWO_PARCELS[3][3] = 0;
TWO_PARCELS[4][4] = 0;

/** TWO_PARCELS after `fillParcels`. */
const TWO_PARCELS_FILLED = SOLUTION.map(row => [...row]);
TWO_PARCELS_FILLED[3][3] = 5;
TWO_PARCELS_FILLED[4][4] = 6;

/** TWO_PARCELS_FILLED with the filled cells of parcel 0 swapped. */
const PARCEL_0_SWAPPED = TWO_PARCELS_FILLED.map(row => [...row]);
PARCEL_0_SWAPPED[0][0] = 8;
PARCEL_0_SWAPPED[2][2] = 7;

/** A random source that returns the given numbers, then fails. */
function scripted(...values: number[]) {
  return jest.fn(() => {
    const value = values.shift();
    if (value === undefined) throw new Error('Out of random numbers');
    return value;
  });
}

function expectFullParcels(grid: Grid) {
  for (let parcel = 0; parcel < 9; ++parcel) {
    const values = [...grid.getParcelValues(parcel)].sort();
    expect(values, `parcel ${parcel}`).toEqual(DIGITS);
  }
}

describe(`fillParcels`, () => {
  it(`fills each parcel with its missing digits in ascending order`, () => {
    const grid = new Grid(EXAMPLE);
    fillParcels(grid);
    expect(grid.toRows()).toEqual(
      rowsOf([
        '713281916',
        '245534824',
        '698796357',
        '345624173',
        '671573268',
        '892819549',
        '145123231',
        '267679485',
        '839845679',
      ]),
    );
    expectFullParcels(grid);
    expect(calcEnergy(grid)).toBe(43);
  });

  it(`rejects a parcel with a repeated clue`, () => {
    const rows = EXAMPLE.map(row => [...row]);
    rows[1][1] = 7;
    expect(() => fillParcels(new Grid(rows))).toThrow(
      new UnsolvableError('Parcel 0 has a repeated clue'),
    );
  });
});

describe(`MonteCarloSolver`, () => {
  it(`solves a nearly solved puzzle`, () => {
    const solver = new MonteCarloSolver({
      maxTries: 10000,
      random: mulberry32(42),
    });
    const puzzle = Puzzle.fromRows(NEARLY_SOLVED);
    expect(solver.solve(puzzle)).toBe(puzzle);
    expect(solver.isSuccess()).toBe(true);
    expect(puzzle.grid.toRows()).toEqual(SOLUTION);
    expect(puzzle.unsolved().toRows()).toEqual(NEARLY_SOLVED);
  });

  it(`keeps every parcel whole when the budget runs out`, () => {
    const solver = new MonteCarloSolver({maxTries: 1, random: mulberry32(1)});
    const puzzle = solver.solve(Puzzle.fromRows(EXAMPLE));
    expect(solver.isSuccess()).toBe(false);
    expect(solver.tries).toBe(1);
    expectFullParcels(puzzle.grid);
    expect(puzzle.unsolved().toRows()).toEqual(EXAMPLE);
  });

  it(`takes no tries on a solved grid`, () => {
    const random = jest.fn(Math.random);
    const solver = new MonteCarloSolver({maxTries: 5, random});
    solver.solve(Puzzle.fromRows(SOLUTION));
    expect(solver.tries).toBe(0);
    expect(solver.isSuccess()).toBe(true);
    expect(random).not.toHaveBeenCalled();
  });

  it(`draws from the random source it is given`, () => {
    const random = jest.fn(mulberry32(3));
    new MonteCarloSolver({maxTries: 10, random}).solve(
      Puzzle.fromRows(EXAMPLE),
    );
    expect(random).toHaveBeenCalled();
  });

  it(`uses the default temperature unless told otherwise`, () => {
    expect(new MonteCarloSolver({maxTries: 1}).temperature).toBe(
      DEFAULT_TEMPERATURE,
    );
    expect(
      new MonteCarloSolver({maxTries: 1, temperature: 0.5}).temperature,
    ).toBe(0.5);
    expect(() => new MonteCarloSolver({maxTries: 1, temperature: 0})).toThrow(
      'Temperature must be positive, got 0',
    );
  });

  describe(`each step`, () => {
    // Draws: the parcel (times 9), then one per shuffle position, then the
    // acceptance number if the swap raises the energy.
    const PARCEL_0 = 0;
    const PARCEL_1 = 0.2;
    const PARCEL_4 = 0.5;

    it(`starts from an energy of 4`, () => {
      const grid = new Grid(TWO_PARCELS);
      fillParcels(grid);
      expect(grid.toRows()).toEqual(TWO_PARCELS_FILLED);
      expect(calcEnergy(grid)).toBe(4);
      expect(calcEnergy(new Grid(PARCEL_0_SWAPPED))).toBe(8);
    });

    it(`keeps a swap that lowers the energy without drawing again`, () => {
      const random = scripted(PARCEL_4, 0);
      const solver = new MonteCarloSolver({maxTries: 10, random});
      const puzzle = solver.solve(Puzzle.fromRows(TWO_PARCELS));
      expect(solver.tries).toBe(1);
      expect(solver.isSuccess()).toBe(true);
      expect(puzzle.grid.toRows()).toEqual(SOLUTION);
      expect(random).toHaveBeenCalledTimes(2);
    });

    it(`reverts a swap that raises the energy when the draw is too high`, () => {
      const random = scripted(PARCEL_0, 0, 0.5);
      const solver = new MonteCarloSolver({maxTries: 1, random});
      const puzzle = solver.solve(Puzzle.fromRows(TWO_PARCELS));
      expect(solver.tries).toBe(1);
      expect(solver.isSuccess()).toBe(false);
      expect(puzzle.grid.toRows()).toEqual(TWO_PARCELS_FILLED);
      expect(random).toHaveBeenCalledTimes(3);
    });

    it(`keeps a swap that raises the energy when the draw is low enough`, () => {
      const random = scripted(PARCEL_0, 0, 0);
      const solver = new MonteCarloSolver({maxTries: 1, random});
      const puzzle = solver.solve(Puzzle.fromRows(TWO_PARCELS));
      expect(puzzle.grid.toRows()).toEqual(PARCEL_0_SWAPPED);
      expect(random).toHaveBeenCalledTimes(3);
    });

    it(`compares against the energy before a reverted swap`, () => {
      // Had the first step taken on the raised energy, the second swap would
      // not have needed an acceptance number.
      const random = scripted(PARCEL_0, 0, 0.5, PARCEL_0, 0, 0.5);
      const solver = new MonteCarloSolver({maxTries: 2, random});
      const puzzle = solver.solve(Puzzle.fromRows(TWO_PARCELS));
      expect(solver.tries).toBe(2);
      expect(puzzle.grid.toRows()).toEqual(TWO_PARCELS_FILLED);
      expect(random).toHaveBeenCalledTimes(6);
    });

    it(`counts a try on a parcel without two mutable fields`, () => {
      const random = scripted(PARCEL_1);
      const solver = new MonteCarloSolver({maxTries: 1, random});
      const puzzle = solver.solve(Puzzle.fromRows(TWO_PARCELS));
      expect(solver.tries).toBe(1);
      expect(puzzle.grid.toRows()).toEqual(TWO_PARCELS_FILLED);
      expect(random).toHaveBeenCalledTimes(1);
    });
  });
});
