/**
 * Error types for Booksmith.
 *
 * Most operations report failures as structured results. These classes cover the
 * remaining conditions that are raised: configuration problems at startup and
 * cache writes that could not be completed.
 */

/**
 * Error thrown when the environment does not describe a usable configuration.
 */
export class ConfigurationError extends Error {
  /**
   * Creates a new ConfigurationError.
   *
   * @param message - Description of the invalid setting
   */
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Error thrown when the book cache cannot persist or remove an entry.
 */
export class CacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CacheError'
  }
}

/**
 * Normalizes an unknown thrown value to an Error instance.
 *
 * @param error - The value that was thrown
 * @returns The same Error, or a new Error carrying the stringified value
 */
export function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
