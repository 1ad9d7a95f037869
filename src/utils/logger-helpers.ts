/**
 * Logger Helpers
 *
 * Lazy evaluation of log context objects, and a guard for invoking
 * consumer callbacks from timer tasks without letting their exceptions
 * escape into the event loop.
 */

import type { Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param contextBuilder - Only called if the level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ snapshots: window.length, current: formatBytes(bytes) }), 'Memory sampled');
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

/**
 * Invoke a consumer callback, logging (never rethrowing) anything it throws.
 *
 * Alert callbacks run inside scheduler ticks; an exception there would
 * surface as an uncaught error in the host process.
 *
 * @returns true when the callback completed
 */
export function invokeGuarded(
  logger: Logger | undefined,
  label: string,
  callback: () => void
): boolean {
  try {
    callback();
    return true;
  } catch (err) {
    logger?.error({ err, callback: label }, 'Callback failed');
    return false;
  }
}
