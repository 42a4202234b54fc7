/**
 * Logger Helpers
 *
 * Lazy evaluation of log context objects: per-request debug context is
 * only built when the level is enabled, so a sweep at info level does
 * not allocate a context object for every request.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

const DEFAULT_LOG_LEVEL = process.env.LOADTEST_LOG_LEVEL ?? 'info';

/**
 * Create the root logger
 *
 * @param level - Minimum level; defaults to LOADTEST_LOG_LEVEL or info
 */
export function createLogger(level: LevelWithSilent | string = DEFAULT_LOG_LEVEL): Logger {
  return pino({ name: 'inference-loadtest', level });
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param level - Log level (trace, debug, info, warn, error, fatal)
 * @param contextBuilder - Function that builds the context object (only called if logging)
 * @param message - Log message string
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ id, status }), 'Request completed');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
