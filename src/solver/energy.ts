import {countDistinct} from '../game/digits';
import {ReadonlyGrid} from '../game/grid';
import {ensureExhaustiveSwitch} from '../game/utils';

/** The kinds of 9-cell groups the energy is summed over. */
export enum EnergyDimension {
  ROW = 'row',
  COLUMN = 'column',
  PARCEL = 'parcel',
}

/**
 * The distinct-value count of a solved grid: 27 groups of 9 distinct values,
 * written 3 * 3^4 for a grid of 3x3 parcels.
 */
export const ENERGY_MAX = 3 * 3 ** 4;

/** Counts the distinct values, blanks included, in one group of 9 cells. */
export function countUniqueElements(
  grid: ReadonlyGrid,
  dimension: EnergyDimension,
  index: number,
): number {
  switch (dimension) {
    case EnergyDimension.ROW:
      return countDistinct(grid.getRow(index));
    case EnergyDimension.COLUMN:
      return countDistinct(grid.getCol(index));
    case EnergyDimension.PARCEL:
      return countDistinct(grid.getParcelValues(index));
    default:
      return ensureExhaustiveSwitch(dimension);
  }
}

/**
 * Measures how far a grid is from a solution: `ENERGY_MAX` minus the number of
 * distinct values in each of the 9 columns, 9 rows and 9 parcels.  A filled
 * grid has energy 0 exactly when it is solved.
 */
export function calcEnergy(grid: ReadonlyGrid): number {
  let energy = ENERGY_MAX;
  for (const dimension of Object.values(EnergyDimension)) {
    for (let index = 0; index < 9; ++index) {
      energy -= countUniqueElements(grid, dimension, index);
    }
  }
  return energy;
}
