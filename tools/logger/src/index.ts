type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop: LogFn = () => {};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_ORDER, value);
}

/**
 * Parse a log level name (case-insensitive), falling back when the value is
 * missing or unrecognized.
 */
function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = 'info',
): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return fallback;
  return isLogLevel(normalized) ? normalized : fallback;
}

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods, level: LogLevel = 'debug') {
    const threshold = LOG_LEVEL_ORDER[level];
    const gate = (methodLevel: Exclude<LogLevel, 'silent'>, fn: LogFn) =>
      LOG_LEVEL_ORDER[methodLevel] >= threshold ? fn : noop;

    this.debug = gate('debug', methods.debug);
    this.info = gate('info', methods.info);
    this.warn = gate('warn', methods.warn);
    this.error = gate('error', methods.error);
  }

  /**
   * Console-backed logger. The level defaults to `STORYCAST_LOG_LEVEL`,
   * then `info`.
   */
  static console(
    level: LogLevel = parseLogLevel(process.env.STORYCAST_LOG_LEVEL),
  ): Logger {
    return new Logger(
      {
        debug: (...args) => console.debug(...args),
        info: (...args) => console.info(...args),
        warn: (...args) => console.warn(...args),
        error: (...args) => console.error(...args),
      },
      level,
    );
  }

  static silent(): Logger {
    return new Logger(
      { debug: noop, info: noop, warn: noop, error: noop },
      'silent',
    );
  }
}

export { Logger, parseLogLevel };
export type { LoggerMethods, LogFn, LogLevel };
