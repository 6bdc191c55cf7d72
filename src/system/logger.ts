import {ensureExhaustiveSwitch} from '../game/utils';

/**
 * The levels a log record can have, from most to least severe.
 */
export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG',
  TRACE = 'TRACE',
}

/** Where formatted log lines go. */
export type LogSink = (line: string) => void;

function severity(level: LogLevel): number {
  switch (level) {
    case LogLevel.ERROR:
      return 0;
    case LogLevel.WARN:
      return 1;
    case LogLevel.INFO:
      return 2;
    case LogLevel.DEBUG:
      return 3;
    case LogLevel.TRACE:
      return 4;
    default:
      return ensureExhaustiveSwitch(level);
  }
}

/**
 * Maps the number of `-v` flags to a threshold: warnings and errors by
 * default, then info, then everything.
 */
export function levelForVerbosity(verbosity: number): LogLevel {
  if (verbosity <= 0) return LogLevel.WARN;
  if (verbosity === 1) return LogLevel.INFO;
  return LogLevel.TRACE;
}

const stderrSink: LogSink = line => {
  process.stderr.write(`${line}\n`);
};

/**
 * Writes `LEVEL: message` lines for every record at or above its threshold.
 */
export class Logger {
  constructor(
    readonly level: LogLevel = LogLevel.WARN,
    private readonly sink: LogSink = stderrSink,
  ) {}

  /** Makes a logger whose threshold follows the `-v` count. */
  static forVerbosity(verbosity: number, sink?: LogSink): Logger {
    return new Logger(levelForVerbosity(verbosity), sink);
  }

  /** A logger that drops everything. */
  static silent(): Logger {
    return new Logger(LogLevel.ERROR, () => {});
  }

  /** Tells whether records at the given level get written. */
  isEnabled(level: LogLevel): boolean {
    return severity(level) <= severity(this.level);
  }

  log(level: LogLevel, message: string): void {
    if (this.isEnabled(level)) this.sink(`${level}: ${message}`);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  warn(message: string): void {
    this.log(LogLevel.WARN, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  trace(message: string): void {
    this.log(LogLevel.TRACE, message);
  }
}
