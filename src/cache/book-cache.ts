import { promises as fs } from 'fs'
import { createHash } from 'crypto'
import { join, dirname } from 'path'
import { z } from 'zod'
import type { Book, Page } from '../types/book.js'
import { CacheError, normalizeError } from '../errors.js'
import { logger } from '../logging/logger.js'
import { flattenPages } from '../renumber/tree.js'

const DEFAULT_MAX_AGE_HOURS = 24
const HOUR_MS = 60 * 60 * 1000

/**
 * Metadata recorded next to a cached book.
 */
export interface BookCacheMetadata {
  /** ISO timestamp of the save. */
  cachedAt: string
  /** Pages at every depth. */
  totalPages: number
  bookTitle: string
  /** md5 of the stored book file. */
  checksum: string
}

/**
 * Cache metadata together with its freshness.
 */
export interface BookCacheInfo extends BookCacheMetadata {
  isValid: boolean
}

/**
 * Storage for fetched books, keyed by book id.
 */
export interface BookCache {
  /**
   * Returns the cached book regardless of age, or undefined when there is none.
   */
  load(bookId: number): Promise<Book | undefined>

  /**
   * Stores a book and stamps it with the current time.
   *
   * @throws CacheError when the entry cannot be written
   */
  save(bookId: number, book: Book): Promise<void>

  /**
   * Whether a cached copy exists and is younger than the maximum age.
   */
  isValid(bookId: number): Promise<boolean>

  /**
   * Drops the cached copy. Missing entries are ignored.
   *
   * @throws CacheError when an entry exists but cannot be removed
   */
  invalidate(bookId: number): Promise<void>

  /**
   * Metadata of the cached copy, or undefined when there is none.
   */
  info(bookId: number): Promise<BookCacheInfo | undefined>
}

const pageSchema: z.ZodType<Page> = z.lazy(() =>
  z.object({
    id: z.number(),
    title: z.string(),
    body: z.string(),
    parentId: z.number().nullable(),
    depth: z.number(),
    seq: z.number(),
    isOpen: z.boolean(),
    children: z.array(pageSchema),
  })
)

const bookSchema = z.object({
  id: z.number(),
  title: z.string(),
  summary: z.string(),
  pages: z.array(pageSchema),
})

const metadataSchema = z.object({
  cachedAt: z.iso.datetime(),
  totalPages: z.number(),
  bookTitle: z.string(),
  checksum: z.string(),
})

/**
 * Configuration for {@link FileBookCache}.
 */
export interface FileBookCacheConfig {
  /** Directory holding the cache files. Created on first save. */
  directory: string

  /** Entries older than this are stale. Defaults to 24. */
  maxAgeHours?: number

  /** Clock used for stamping and expiry. */
  now?: () => Date
}

/**
 * File-based book cache.
 *
 * Each book is stored as `book_<id>.json` with its metadata in
 * `book_<id>_meta.json`. An entry that cannot be read or parsed, or whose
 * checksum does not match, is logged and treated as absent.
 */
export class FileBookCache implements BookCache {
  private readonly _directory: string
  private readonly _maxAgeMs: number
  private readonly _now: () => Date

  constructor(config: FileBookCacheConfig) {
    this._directory = config.directory
    this._maxAgeMs = (config.maxAgeHours ?? DEFAULT_MAX_AGE_HOURS) * HOUR_MS
    this._now = config.now ?? (() => new Date())
  }

  get directory(): string {
    return this._directory
  }

  async load(bookId: number): Promise<Book | undefined> {
    const content = await this._readFile(this._bookPath(bookId))
    if (content === undefined) {
      return undefined
    }

    const metadata = await this._readMetadata(bookId)
    if (metadata !== undefined && metadata.checksum !== checksum(content)) {
      logger.warn(`[book-cache] checksum mismatch for book ${bookId}, ignoring cached copy`)
      return undefined
    }

    return this._parse(bookId, content, bookSchema)
  }

  async save(bookId: number, book: Book): Promise<void> {
    const content = JSON.stringify(book, null, 2)
    const metadata: BookCacheMetadata = {
      cachedAt: this._now().toISOString(),
      totalPages: flattenPages(book.pages).length,
      bookTitle: book.title,
      checksum: checksum(content),
    }

    await this._writeFile(this._bookPath(bookId), content)
    await this._writeFile(this._metadataPath(bookId), JSON.stringify(metadata, null, 2))
    logger.debug(`[book-cache] saved book ${bookId} with ${metadata.totalPages} pages`)
  }

  async isValid(bookId: number): Promise<boolean> {
    const metadata = await this._readMetadata(bookId)
    return metadata !== undefined && this._isFresh(metadata)
  }

  async invalidate(bookId: number): Promise<void> {
    for (const path of [this._metadataPath(bookId), this._bookPath(bookId)]) {
      try {
        await fs.rm(path, { force: true })
      } catch (error: unknown) {
        throw new CacheError(`Failed to remove ${path}`, { cause: error })
      }
    }
  }

  async info(bookId: number): Promise<BookCacheInfo | undefined> {
    const metadata = await this._readMetadata(bookId)
    return metadata === undefined ? undefined : { ...metadata, isValid: this._isFresh(metadata) }
  }

  private _isFresh(metadata: BookCacheMetadata): boolean {
    const age = this._now().getTime() - Date.parse(metadata.cachedAt)
    return age < this._maxAgeMs
  }

  private _bookPath(bookId: number): string {
    return join(this._directory, `book_${bookId}.json`)
  }

  private _metadataPath(bookId: number): string {
    return join(this._directory, `book_${bookId}_meta.json`)
  }

  private async _readMetadata(bookId: number): Promise<BookCacheMetadata | undefined> {
    const content = await this._readFile(this._metadataPath(bookId))
    return content === undefined ? undefined : this._parse(bookId, content, metadataSchema)
  }

  private _parse<T>(bookId: number, content: string, schema: z.ZodType<T>): T | undefined {
    let data: unknown
    try {
      data = JSON.parse(content)
    } catch (error: unknown) {
      logger.warn(`[book-cache] invalid JSON in cache entry for book ${bookId}:`, normalizeError(error).message)
      return undefined
    }

    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      logger.warn(`[book-cache] unexpected cache entry shape for book ${bookId}`)
      return undefined
    }
    return parsed.data
  }

  /**
   * Reads a file, treating a missing or unreadable file as absent.
   */
  private async _readFile(path: string): Promise<string | undefined> {
    try {
      return await fs.readFile(path, 'utf8')
    } catch (error: unknown) {
      if (!isFileNotFoundError(error)) {
        logger.warn(`[book-cache] failed to read ${path}:`, normalizeError(error).message)
      }
      return undefined
    }
  }

  /**
   * Writes a file atomically.
   */
  private async _writeFile(path: string, content: string): Promise<void> {
    try {
      await fs.mkdir(dirname(path), { recursive: true })
      const tmpPath = `${path}.tmp`
      await fs.writeFile(tmpPath, content, 'utf8')
      await fs.rename(tmpPath, path)
    } catch (error: unknown) {
      throw new CacheError(`Failed to write file ${path}`, { cause: error })
    }
  }
}

function checksum(content: string): string {
  return createHash('md5').update(content).digest('hex')
}

function isFileNotFoundError(error: unknown): boolean {
  return error !== null && typeof error === 'object' && 'code' in error && error.code === 'ENOENT'
}
