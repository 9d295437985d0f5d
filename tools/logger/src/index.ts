type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop: LogFn = () => {};

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

  /**
   * Wrap methods so calls below `level` are dropped
   */
  static withLevel(methods: LoggerMethods, level: LogLevel): Logger {
    const enabled = (candidate: Exclude<LogLevel, 'silent'>) =>
      LEVEL_RANK[candidate] >= LEVEL_RANK[level];

    return new Logger({
      debug: enabled('debug') ? methods.debug : noop,
      info: enabled('info') ? methods.info : noop,
      warn: enabled('warn') ? methods.warn : noop,
      error: enabled('error') ? methods.error : noop,
    });
  }
}

/**
 * Console-backed logger, filtered by level (default: info)
 */
function createConsoleLogger(level: LogLevel = 'info'): Logger {
  return Logger.withLevel(
    {
      debug: (...args) => console.debug(...args),
      info: (...args) => console.info(...args),
      warn: (...args) => console.warn(...args),
      error: (...args) => console.error(...args),
    },
    level,
  );
}

export { Logger, createConsoleLogger };
export type { LoggerMethods, LogFn, LogLevel };
