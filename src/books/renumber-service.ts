import type { ApiError, ApiResult, ContentApiClient } from '../content-api/client.js'
import { analyzeRenumber } from '../renumber/planner.js'
import type { RenumberOutcome } from '../renumber/planner.js'
import { buildRenumberPatches } from '../renumber/patches.js'
import type { PagePatch } from '../renumber/patches.js'
import type { BookService } from './book-service.js'
import { logger } from '../logging/logger.js'
import { normalizeError } from '../errors.js'

/**
 * A renumbering computed against the current state of a book.
 */
export interface RenumberPreview {
  bookId: number
  startPageId: number
  offset: number
  outcome: RenumberOutcome
  /** One patch per plan entry, in document order. */
  patches: PagePatch[]
}

/**
 * Result of writing one patched page back.
 */
export type PageWriteResult = { pageId: number; ok: true } | { pageId: number; ok: false; error: ApiError }

export interface RenumberApplyResult extends RenumberPreview {
  /** One entry per changed page, in the order they were written. */
  writes: PageWriteResult[]
}

/**
 * The part of the content API a renumber service writes through.
 */
export type PageWriter = Pick<ContentApiClient, 'savePage'>

/**
 * Previews and applies section renumbering against a live book.
 *
 * Both operations fetch the book fresh so the plan reflects what the service
 * holds now, not an older cached copy.
 */
export class RenumberService {
  private readonly _books: BookService
  private readonly _writer: PageWriter

  constructor(books: BookService, writer: PageWriter) {
    this._books = books
    this._writer = writer
  }

  async preview(bookId: number, startPageId: number, offset = 1): Promise<ApiResult<RenumberPreview>> {
    const book = await this._books.getBook(bookId, { refresh: true })
    if (!book.ok) {
      return book
    }

    const outcome = analyzeRenumber(book.value.pages, startPageId, offset)
    return {
      ok: true,
      value: {
        bookId,
        startPageId,
        offset,
        outcome,
        patches: buildRenumberPatches(book.value.pages, outcome.entries),
      },
    }
  }

  /**
   * Writes every changed page. A failed write is reported and the remaining
   * pages are still written. The book's cache entry is dropped afterwards.
   */
  async apply(bookId: number, startPageId: number, offset = 1): Promise<ApiResult<RenumberApplyResult>> {
    const preview = await this.preview(bookId, startPageId, offset)
    if (!preview.ok) {
      return preview
    }

    const writes: PageWriteResult[] = []
    for (const patch of preview.value.patches) {
      if (!patch.changed || patch.placement === undefined) {
        continue
      }

      const saved = await this._writer.savePage(patch.pageId, {
        title: patch.after.title,
        body: patch.after.body,
        parentId: patch.placement.parentId,
        isOpen: patch.placement.isOpen,
      })
      if (saved.ok) {
        writes.push({ pageId: patch.pageId, ok: true })
      } else {
        logger.warn(`[renumber] failed to save page ${patch.pageId}: ${saved.error.message}`)
        writes.push({ pageId: patch.pageId, ok: false, error: saved.error })
      }
    }

    if (writes.length > 0) {
      try {
        await this._books.invalidate(bookId)
      } catch (error: unknown) {
        logger.warn(`[renumber] could not invalidate cached book ${bookId}:`, normalizeError(error).message)
      }
    }

    return { ok: true, value: { ...preview.value, writes } }
  }
}
