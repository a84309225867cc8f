import { format } from 'node:util';

/**
 * Logger interface for dependency injection
 */
export interface Logger {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

/**
 * Creates a logger instance that wraps the provided logger or falls back to console
 * @param providedLogger - Optional logger implementation
 * @returns Logger instance
 */
export function createLogger(providedLogger?: Partial<Logger>): Logger {
  return {
    info: (...args: unknown[]): void => {
      if (providedLogger && typeof providedLogger.info === 'function') {
        providedLogger.info(...args);
      } else {
        console.info(...args);
      }
    },
    error: (...args: unknown[]): void => {
      if (providedLogger && typeof providedLogger.error === 'function') {
        providedLogger.error(...args);
      } else {
        console.error(...args);
      }
    },
    warn: (...args: unknown[]): void => {
      if (providedLogger && typeof providedLogger.warn === 'function') {
        providedLogger.warn(...args);
      } else {
        console.warn(...args);
      }
    },
    debug: (...args: unknown[]): void => {
      if (providedLogger && typeof providedLogger.debug === 'function') {
        providedLogger.debug(...args);
      } else {
        console.debug(...args);
      }
    },
  };
}

export interface StderrLoggerOptions {
  verbose?: boolean;
  prefix?: string;
  stream?: { write(chunk: string): unknown };
}

/**
 * Creates a logger writing prefixed lines to stderr, keeping stdout free for
 * the report. Debug output is dropped unless verbose.
 */
export function createStderrLogger(options: StderrLoggerOptions = {}): Logger {
  const { verbose = false, prefix = '[dirty-repos]', stream = process.stderr } = options;
  const write = (...args: unknown[]): void => {
    stream.write(`${prefix} ${format(...args)}\n`);
  };

  return createLogger({
    info: write,
    warn: write,
    error: write,
    debug: verbose ? write : () => {},
  });
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): Logger {
  const noop = (): void => {};
  return createLogger({ info: noop, warn: noop, error: noop, debug: noop });
}
