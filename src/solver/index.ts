import {ensureExhaustiveSwitch} from '../game/utils';
import {BacktrackingSolver} from './backtracking';
import {MonteCarloOptions, MonteCarloSolver} from './montecarlo';
import {Solver, SolverAlgorithm, SolverOptions} from './solver';

export {BacktrackingSolver} from './backtracking';
export {calcEnergy, ENERGY_MAX} from './energy';
export {DEFAULT_TEMPERATURE, MonteCarloSolver} from './montecarlo';
export {mulberry32, type Random} from './random';
export {type Solver, SolverAlgorithm, type SolverOptions} from './solver';

interface BacktrackingSpec extends SolverOptions {
  readonly algorithm: SolverAlgorithm.BACKTRACING;
}

interface MonteCarloSpec extends MonteCarloOptions {
  readonly algorithm: SolverAlgorithm.MONTECARLO;
}

/** Names an algorithm together with the settings it takes. */
export type SolverSpec = BacktrackingSpec | MonteCarloSpec;

/** Makes a fresh solver for the given algorithm and settings. */
export function createSolver(spec: SolverSpec): Solver {
  switch (spec.algorithm) {
    case SolverAlgorithm.BACKTRACING:
      return new BacktrackingSolver(spec);
    case SolverAlgorithm.MONTECARLO:
      return new MonteCarloSolver(spec);
    default:
      return ensureExhaustiveSwitch(spec);
  }
}
