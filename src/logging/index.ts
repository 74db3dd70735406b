/**
 * Logging module exports.
 *
 * A single module-level logger that callers can replace, plus a level-filtered
 * console logger for the command line entry point.
 */

export { logger, configureLogging, createConsoleLogger } from './logger.js'
export type { Logger, LogLevel } from './types.js'
