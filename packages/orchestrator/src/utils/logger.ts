/**
 * Logger Utility
 *
 * Level-filtered console logging with a `[service-name]` prefix.
 *
 * Usage:
 *   const logger = createLogger('scheduler');
 *   logger.info('Tick complete');
 *   logger.error('Housekeeping job failed', error);
 *
 * Environment:
 *   LOG_LEVEL=DEBUG|INFO|WARNING|ERROR (default: INFO)
 *
 * @module
 */

/**
 * Supported log levels in ascending severity order.
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export interface Logger {
  /** Guard skips, individual lease checks, poll cycles */
  debug(message: string, ...args: unknown[]): void;
  /** Claims, spawns, reaps, transitions */
  info(message: string, ...args: unknown[]): void;
  /** Recoverable issues: degraded outcomes, requeues after crashes */
  warn(message: string, ...args: unknown[]): void;
  /** Failed operations */
  error(message: string, ...args: unknown[]): void;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

/**
 * Resolves the minimum level from LOG_LEVEL. Read on every call so a
 * change to process.env takes effect without restart.
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return DEFAULT_LOG_LEVEL;
}

function shouldLog(messageLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[messageLevel] >= LOG_LEVEL_VALUES[getLogLevel()];
}

/**
 * Creates a logger whose lines start with `[serviceName]`.
 *
 * @example
 * ```ts
 * const logger = createLogger('lease-service');
 * logger.info('Claimed TASK-1');
 * // Output: [lease-service] Claimed TASK-1
 * ```
 */
export function createLogger(serviceName: string): Logger {
  const prefix = `[${serviceName}]`;

  return {
    debug(message: string, ...args: unknown[]): void {
      if (shouldLog('DEBUG')) {
        console.debug(prefix, message, ...args);
      }
    },

    info(message: string, ...args: unknown[]): void {
      if (shouldLog('INFO')) {
        console.log(prefix, message, ...args);
      }
    },

    warn(message: string, ...args: unknown[]): void {
      if (shouldLog('WARNING')) {
        console.warn(prefix, message, ...args);
      }
    },

    error(message: string, ...args: unknown[]): void {
      if (shouldLog('ERROR')) {
        console.error(prefix, message, ...args);
      }
    },
  };
}
