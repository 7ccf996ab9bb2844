import chalk from 'chalk';

type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

type LogLevel = keyof LoggerMethods;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: chalk.gray('debug'),
  info: chalk.cyan('info '),
  warn: chalk.yellow('warn '),
  error: chalk.red('error'),
};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

interface ConsoleLoggerOptions {
  /** Lowest level that is written (default: 'info') */
  level?: LogLevel;
  /** Sink for debug/info lines (default: console.log) */
  out?: LogFn;
  /** Sink for warn/error lines (default: console.error) */
  err?: LogFn;
}

/**
 * Create a leveled console logger with colored level labels.
 *
 * Lines below the configured level are dropped. Warnings and errors go to
 * stderr so that stdout stays usable for command output.
 */
function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const out = options.out ?? ((...args: unknown[]) => console.log(...args));
  const err = options.err ?? ((...args: unknown[]) => console.error(...args));

  const emit =
    (level: LogLevel, sink: LogFn): LogFn =>
    (...args) => {
      if (LEVEL_ORDER[level] < threshold) return;
      sink(LEVEL_LABEL[level], ...args);
    };

  return new Logger({
    debug: emit('debug', out),
    info: emit('info', out),
    warn: emit('warn', err),
    error: emit('error', err),
  });
}

export { Logger, createConsoleLogger };
export type { ConsoleLoggerOptions, LoggerMethods, LogFn, LogLevel };
