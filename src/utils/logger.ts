export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface ConsoleLoggerOptions {
  /** Lowest level that is written. Defaults to `'info'`. */
  level?: LogLevel;
}

/**
 * Writes `<ISO timestamp> [tag] message` lines.
 * `warn` and `error` go to stderr, everything else to stdout.
 */
export function createConsoleLogger(tag: string, options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];

  const write = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = `${new Date().toISOString()} [${tag}] ${message}`;
    if (level === 'warn' || level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
