/**
 * Logger Helpers
 *
 * Encoding and transport run once per command, so log context objects are
 * only built when the level is actually enabled.
 */

import { pino, type Logger } from 'pino';
import type { LogLevel } from '../types/index.js';

type EnabledLevel = Exclude<LogLevel, 'silent'>;
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @example
 * // Context only created if debug is enabled
 * lazyLog(logger, 'debug', () => ({ endpoint, requestBytes }), 'Sending request');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: EnabledLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}

/**
 * Root logger for a client instance.
 */
export function createLogger(level: LogLevel, name = 'memrelay'): Logger {
  return pino({ name, level });
}
