import type { Book } from '../types/book.js'
import type { BookCache } from '../cache/book-cache.js'
import type { ApiResult, ContentApiClient } from '../content-api/client.js'
import { logger } from '../logging/logger.js'
import { normalizeError } from '../errors.js'

/**
 * Options for {@link BookService.getBook}.
 */
export interface GetBookOptions {
  /** Skip the cache and fetch from the API. Defaults to false. */
  refresh?: boolean
}

/**
 * The part of the content API a book service needs.
 */
export type BookSource = Pick<ContentApiClient, 'fetchBook'>

/**
 * Serves books from the cache, fetching them from the content API when the
 * cached copy is missing or stale.
 *
 * Concurrent requests for the same book share one fetch.
 */
export class BookService {
  private readonly _source: BookSource
  private readonly _cache: BookCache
  private readonly _inFlight = new Map<number, Promise<ApiResult<Book>>>()

  constructor(source: BookSource, cache: BookCache) {
    this._source = source
    this._cache = cache
  }

  get cache(): BookCache {
    return this._cache
  }

  async getBook(bookId: number, options: GetBookOptions = {}): Promise<ApiResult<Book>> {
    if (!options.refresh && (await this._cache.isValid(bookId))) {
      const cached = await this._cache.load(bookId)
      if (cached !== undefined) {
        logger.debug(`[book-service] serving book ${bookId} from cache`)
        return { ok: true, value: cached }
      }
    }

    const pending = this._inFlight.get(bookId)
    if (pending !== undefined) {
      return pending
    }

    const request = this._fetchAndStore(bookId).finally(() => {
      this._inFlight.delete(bookId)
    })
    this._inFlight.set(bookId, request)
    return request
  }

  /**
   * Drops the cached copy so the next read fetches again.
   */
  async invalidate(bookId: number): Promise<void> {
    await this._cache.invalidate(bookId)
  }

  private async _fetchAndStore(bookId: number): Promise<ApiResult<Book>> {
    const result = await this._source.fetchBook(bookId)
    if (!result.ok) {
      return result
    }

    try {
      await this._cache.save(bookId, result.value)
    } catch (error: unknown) {
      logger.warn(`[book-service] could not cache book ${bookId}:`, normalizeError(error).message)
    }
    return result
  }
}
