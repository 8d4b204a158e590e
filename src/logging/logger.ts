/**
 * Structured logging.
 *
 * Uses pino with a single level option. Modules accept an optional logger
 * and derive a child tagged with their own name.
 */

import { pino, type Logger } from 'pino';

export type { Logger };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface LoggerOptions {
  /** Minimum level (default: INFORMANT_LOG_LEVEL or 'info') */
  level?: LogLevel;
  /** Logger name (default: 'informant-ontology') */
  name?: string;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some(level => level === value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.INFORMANT_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Create a new root logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'informant-ontology',
    level: options.level ?? defaultLevel(),
  });
}

/** Process-wide default logger. */
export const logger: Logger = createLogger();

/**
 * Child logger for a module, falling back to the default logger.
 */
export function moduleLogger(module: string, parent?: Logger): Logger {
  return (parent ?? logger).child({ module });
}
