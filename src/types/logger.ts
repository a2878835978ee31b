/**
 * Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger accepted by the client and the resolvers
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const client = new Client(servers, { logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const client = new Client(servers, { logger: console });
 * ```
 */
export interface Logger {
  /**
   * Attempts, fallbacks, failovers and resolver hops
   */
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (message: string, ...args: unknown[]) => console.debug(message, ...args),
  info: (message: string, ...args: unknown[]) => console.info(message, ...args),
  warn: (message: string, ...args: unknown[]) => console.warn(message, ...args),
  error: (message: string, ...args: unknown[]) => console.error(message, ...args),
};

/**
 * Silent logger - no output
 * Default for library use and tests
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const enabled = (level: LogLevel) => LEVELS[level] >= LEVELS[minLevel];

  return {
    debug: (message: string, ...args: unknown[]) => {
      if (enabled('debug')) baseLogger.debug(message, ...args);
    },
    info: (message: string, ...args: unknown[]) => {
      if (enabled('info')) baseLogger.info(message, ...args);
    },
    warn: (message: string, ...args: unknown[]) => {
      if (enabled('warn')) baseLogger.warn(message, ...args);
    },
    error: (message: string, ...args: unknown[]) => {
      if (enabled('error')) baseLogger.error(message, ...args);
    },
  };
}
