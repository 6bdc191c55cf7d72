import {
  InputFileError,
  MalformedInputError,
  UnsolvableError,
  UsageError,
} from './game/errors';
import {ensureExhaustiveSwitch} from './game/utils';
import {createSolver, mulberry32, SolverAlgorithm, SolverSpec} from './solver';
import {Config, parseConfig, USAGE, VERSION} from './system/config';
import {Logger, LogSink} from './system/logger';
import {readPuzzleFile} from './system/puzzle-file';

/** Exit codes of the command-line program. */
export enum ExitCode {
  OK = 0,
  NOT_SOLVED = 1,
  BAD_INPUT = 2,
}

/** Where the program's output goes. */
export interface CliIo {
  /** Receives the program's results, one chunk per call. */
  readonly stdout: (text: string) => void;
  /** Receives log lines; stderr when omitted. */
  readonly logSink?: LogSink;
}

const processIo: CliIo = {
  stdout: text => {
    process.stdout.write(`${text}\n`);
  },
};

/**
 * Runs the solver as the command line describes, and returns the exit code.
 *
 * @param args The command-line arguments after the script name.
 */
export async function run(
  args: readonly string[],
  io: CliIo = processIo,
): Promise<ExitCode> {
  let config: Config;
  try {
    config = parseConfig(args);
  } catch (e: unknown) {
    if (!(e instanceof UsageError)) throw e;
    new Logger(undefined, io.logSink).error(`${e.message}\n\n${USAGE}`);
    return ExitCode.BAD_INPUT;
  }
  if (config.help) {
    io.stdout(USAGE);
    return ExitCode.OK;
  }
  if (config.version) {
    io.stdout(VERSION);
    return ExitCode.OK;
  }

  const logger = Logger.forVerbosity(config.verbosity, io.logSink);
  logger.debug(`Set logging level to: ${logger.level}`);
  try {
    return await solve(config, logger, io);
  } catch (e: unknown) {
    if (e instanceof MalformedInputError || e instanceof InputFileError) {
      logger.error(e.message);
      return ExitCode.BAD_INPUT;
    }
    if (e instanceof UnsolvableError) {
      logger.error(e.message);
      return ExitCode.NOT_SOLVED;
    }
    throw e;
  }
}

async function solve(
  config: Config,
  logger: Logger,
  io: CliIo,
): Promise<ExitCode> {
  logger.info(`Using input file: ${config.inputFile}`);
  logger.info(`Using maximum number of tries: ${config.maxTries}`);
  logger.info(`Using algorithm: ${config.algorithm}`);
  const puzzle = await readPuzzleFile(config.inputFile);
  logger.debug(`Read puzzle:\n${puzzle}`);

  const solver = createSolver(solverSpec(config, logger));
  solver.solve(puzzle);
  if (!solver.isSuccess()) {
    logger.debug(`Unspecified intermediate grid:\n${puzzle}`);
    logger.error(
      `Could not solve the sudoku. Exceeded the limit of ${config.maxTries} tries; try a higher --max-tries.`,
    );
    return ExitCode.NOT_SOLVED;
  }
  logger.info(`Solved. Needed ${solver.tries} tries.`);
  io.stdout(puzzle.render(config.showUnsolved));
  return ExitCode.OK;
}

function solverSpec(config: Config, logger: Logger): SolverSpec {
  const {algorithm, maxTries, seed} = config;
  switch (algorithm) {
    case SolverAlgorithm.BACKTRACING:
      if (seed !== undefined) {
        logger.warn('Ignoring --seed: the backtracing algorithm is not random');
      }
      return {algorithm, maxTries, logger};
    case SolverAlgorithm.MONTECARLO:
      return {
        algorithm,
        maxTries,
        logger,
        ...(seed === undefined ? {} : {random: mulberry32(seed)}),
      };
    default:
      return ensureExhaustiveSwitch(algorithm);
  }
}
