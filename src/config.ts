import { homedir } from 'os'
import { join } from 'path'
import { z } from 'zod'
import { DEFAULT_CONTENT_API_URL } from './content-api/client.js'
import { ConfigurationError } from './errors.js'
import type { LogLevel } from './logging/types.js'
import { formatZodError } from './utils/zod.js'

/**
 * Settings read from the environment.
 */
export interface BooksmithConfig {
  apiUrl: string
  /** Absent when no token is set; API calls then fail with `missingToken`. */
  apiToken?: string
  cacheDir: string
  cacheMaxAgeHours: number
  logLevel: LogLevel
}

export const DEFAULT_CACHE_DIR = join(homedir(), '.booksmith', 'cache')

const envSchema = z.object({
  CONTENT_API_URL: z.url().default(DEFAULT_CONTENT_API_URL),
  CONTENT_API_TOKEN: z.string().optional(),
  BOOK_CACHE_DIR: z.string().default(DEFAULT_CACHE_DIR),
  BOOK_CACHE_MAX_AGE_HOURS: z.coerce.number().positive().default(24),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
})

/**
 * Reads configuration from environment variables. Blank values count as unset.
 *
 * @param env - Variables to read, usually `process.env`
 * @throws ConfigurationError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig({ CONTENT_API_TOKEN: 'test-secret', LOG_LEVEL: 'info' })
 * config.cacheMaxAgeHours // 24
 * ```
 */
export function loadConfig(env: Record<string, string | undefined>): BooksmithConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== '')
  )

  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatZodError(parsed.error)}`)
  }

  const { CONTENT_API_URL, CONTENT_API_TOKEN, BOOK_CACHE_DIR, BOOK_CACHE_MAX_AGE_HOURS, LOG_LEVEL } = parsed.data
  const config: BooksmithConfig = {
    apiUrl: CONTENT_API_URL,
    cacheDir: BOOK_CACHE_DIR,
    cacheMaxAgeHours: BOOK_CACHE_MAX_AGE_HOURS,
    logLevel: LOG_LEVEL,
  }
  if (CONTENT_API_TOKEN !== undefined) {
    config.apiToken = CONTENT_API_TOKEN
  }
  return config
}
