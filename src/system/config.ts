import {parseArgs} from 'node:util';
import {UsageError} from '../game/errors';
import {SolverAlgorithm} from '../solver/solver';

/** The program's version, as reported by `--version`. */
export const VERSION = '0.1.0';

export const DEFAULT_MAX_TRIES = 100000;

export const USAGE = `Usage: sudoku-solver [options] <INPUT>

Solves the Sudoku read from the INPUT file.

Options:
  --show-unsolved        show the unsolved puzzle next to the solution
  --max-tries <n>        give up after n steps (default ${DEFAULT_MAX_TRIES})
  --algorithm <name>     backtracing or montecarlo (default backtracing)
  --seed <n>             seed the Monte Carlo search, for repeatable runs
  -v, --verbose          log more; repeat for even more
  -h, --help             show this help
  --version              show the version`;

/** Everything the command line says to do. */
export interface Config {
  readonly inputFile: string;
  readonly maxTries: number;
  readonly showUnsolved: boolean;
  readonly algorithm: SolverAlgorithm;
  /** How many times `-v` was given. */
  readonly verbosity: number;
  /** Seeds the random source when present. */
  readonly seed?: number;
  readonly help: boolean;
  readonly version: boolean;
}

/**
 * Parses command-line arguments, not including the node binary and script.
 *
 * @throws UsageError for unknown options, missing or extra file names, and
 *     values that don't parse.
 */
export function parseConfig(args: readonly string[]): Config {
  const {values, positionals} = parseArgsOrThrow(args);
  const help = values.help ?? false;
  const version = values.version ?? false;
  if (!help && !version && positionals.length !== 1) {
    throw new UsageError(
      positionals.length === 0
        ? 'Missing the INPUT file'
        : `Expected one INPUT file, got ${positionals.length}`,
    );
  }
  const seed = values.seed;
  return {
    inputFile: positionals[0] ?? '',
    maxTries:
      values['max-tries'] === undefined
        ? DEFAULT_MAX_TRIES
        : parseUint(values['max-tries'], '--max-tries', 1),
    showUnsolved: values['show-unsolved'] ?? false,
    algorithm: parseAlgorithm(values.algorithm ?? SolverAlgorithm.BACKTRACING),
    verbosity: values.verbose?.length ?? 0,
    ...(seed === undefined ? {} : {seed: parseUint(seed, '--seed', 0)}),
    help,
    version,
  };
}

function parseArgsOrThrow(args: readonly string[]) {
  try {
    return parseArgs({
      args: [...args],
      allowPositionals: true,
      strict: true,
      options: {
        'show-unsolved': {type: 'boolean', default: false},
        'max-tries': {type: 'string'},
        algorithm: {type: 'string'},
        seed: {type: 'string'},
        verbose: {type: 'boolean', short: 'v', multiple: true},
        help: {type: 'boolean', short: 'h', default: false},
        version: {type: 'boolean', default: false},
      },
    });
  } catch (e: unknown) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }
}

function parseAlgorithm(name: string): SolverAlgorithm {
  for (const algorithm of Object.values(SolverAlgorithm)) {
    if (algorithm === name) return algorithm;
  }
  const known = Object.values(SolverAlgorithm).join(', ');
  throw new UsageError(`Unknown algorithm "${name}"; expected one of ${known}`);
}

const MAX_UINT32 = 0xffffffff;

function parseUint(text: string, option: string, min: number): number {
  const n = /^\d+$/.test(text) ? Number(text) : NaN;
  if (!(n >= min && n <= MAX_UINT32)) {
    throw new UsageError(
      `${option} takes a whole number from ${min} to ${MAX_UINT32}, got "${text}"`,
    );
  }
  return n;
}
