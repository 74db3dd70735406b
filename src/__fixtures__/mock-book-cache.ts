import type { Book } from '../types/book.js'
import type { BookCache, BookCacheInfo } from '../cache/book-cache.js'
import { flattenPages } from '../renumber/tree.js'
import { CacheError } from '../errors.js'

/**
 * In-memory book cache for testing. Entries stay valid until marked stale.
 */
export class MockBookCache implements BookCache {
  private books = new Map<number, Book>()
  private stale = new Set<number>()
  public shouldThrowErrors = false

  async load(bookId: number): Promise<Book | undefined> {
    return this.books.get(bookId)
  }

  async save(bookId: number, book: Book): Promise<void> {
    if (this.shouldThrowErrors) throw new CacheError('Mock save error')
    this.books.set(bookId, book)
    this.stale.delete(bookId)
  }

  async isValid(bookId: number): Promise<boolean> {
    return this.books.has(bookId) && !this.stale.has(bookId)
  }

  async invalidate(bookId: number): Promise<void> {
    if (this.shouldThrowErrors) throw new CacheError('Mock invalidate error')
    this.books.delete(bookId)
    this.stale.delete(bookId)
  }

  async info(bookId: number): Promise<BookCacheInfo | undefined> {
    const book = this.books.get(bookId)
    if (book === undefined) return undefined
    return {
      cachedAt: '2024-01-01T00:00:00.000Z',
      totalPages: flattenPages(book.pages).length,
      bookTitle: book.title,
      checksum: 'mock-checksum',
      isValid: !this.stale.has(bookId),
    }
  }

  markStale(bookId: number): void {
    this.stale.add(bookId)
  }
}
