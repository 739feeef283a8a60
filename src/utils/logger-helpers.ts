/**
 * Logger Helpers
 *
 * Default logger construction and lazy evaluation of log context objects
 * (context is only built when the level is enabled).
 */

import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';

/**
 * Create the default pino logger used when a caller supplies none.
 *
 * @param level - Minimum level; `LOG_LEVEL` overrides when unset
 * @param name - Logger name bound into every line
 */
export function createLogger(level?: LevelWithSilent, name = 'completion-relay'): Logger {
  const envLevel = process.env.LOG_LEVEL;
  return pino({
    name,
    level: level ?? (isLevel(envLevel) ? envLevel : DEFAULT_LOG_LEVEL),
  });
}

function isLevel(value: string | undefined): value is LevelWithSilent {
  return (
    value === 'trace' ||
    value === 'debug' ||
    value === 'info' ||
    value === 'warn' ||
    value === 'error' ||
    value === 'fatal' ||
    value === 'silent'
  );
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @example
 * // Context only created if debug is enabled
 * lazyLog(logger, 'debug', () => ({ fingerprint, size }), 'Cache hit');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger) {
    return;
  }

  if (!logger.isLevelEnabled(level)) {
    return;
  }

  const context = contextBuilder();
  logger[level](context, message);
}
