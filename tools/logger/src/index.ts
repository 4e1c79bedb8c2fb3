type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
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
   * Create a logger that writes every level to stderr (console.error),
   * keeping stdout free for reports. Levels below `minLevel` are dropped.
   */
  static toStderr(minLevel: LogLevel = 'info'): Logger {
    const enabled = (level: LogLevel) =>
      LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

    const write: LogFn = (...args) => {
      console.error(...args);
    };

    return new Logger({
      debug: enabled('debug') ? write : noop,
      info: enabled('info') ? write : noop,
      warn: enabled('warn') ? write : noop,
      error: enabled('error') ? write : noop,
    });
  }
}

export { Logger };
export type { LoggerMethods, LogFn, LogLevel };
