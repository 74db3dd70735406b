/**
 * Logger configuration.
 *
 * Library code logs through the exported `logger`. Embedders can inject their
 * own implementation to control levels, formatting and destination.
 */

import type { Logger, LogLevel } from './types.js'

/**
 * Default logger implementation.
 *
 * Only logs warnings and errors to console. Debug and info are no-ops.
 */
const defaultLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/**
 * Global logger instance.
 */
export let logger: Logger = defaultLogger

/**
 * Configures the global logger.
 *
 * @param customLogger - The logger implementation to use
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import { configureLogging } from 'booksmith'
 *
 * configureLogging(pino({ level: 'debug' }))
 * ```
 */
export function configureLogging(customLogger: Logger): void {
  logger = customLogger
}

/**
 * Creates a logger that writes every enabled level to stderr.
 *
 * stdout carries the MCP protocol when the server runs on stdio, so nothing
 * here may write to it.
 *
 * @param level - Lowest level that is printed
 */
export function createConsoleLogger(level: LogLevel): Logger {
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level]
  const write =
    (candidate: LogLevel) =>
    (...args: unknown[]): void => {
      if (enabled(candidate)) {
        console.error(...args)
      }
    }

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  }
}
