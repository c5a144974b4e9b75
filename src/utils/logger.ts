/**
 * Structured logging with pino, one named logger per component.
 */

import pino, { type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const DEFAULT_LEVEL: LogLevel = 'warn';

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Resolve the log level from ATTRFLOW_LOG_LEVEL, falling back to "warn".
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env.ATTRFLOW_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) return level;
  return DEFAULT_LEVEL;
}

const root: Logger = pino({ name: 'attrflow', level: getLogLevel() });

/**
 * Create a child logger for a component.
 *
 * @example
 * ```typescript
 * const logger = createLogger('completion');
 * logger.debug({ node: 'pipeline.smooth' }, 'child skipped');
 * ```
 */
export function createLogger(component: string): Logger {
  return root.child({ component });
}

export type { Logger };
