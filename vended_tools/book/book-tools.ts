import { z } from 'zod'
import { tool } from '../../src/tools/zod-tool.js'
import type { ContentApiClient } from '../../src/content-api/client.js'
import { apiErrorToJson, toToolOutput } from '../../src/content-api/output.js'
import type { BookService } from '../../src/books/book-service.js'
import type { RenumberApplyResult, RenumberPreview, RenumberService } from '../../src/books/renumber-service.js'
import { bookStructure, searchBook } from '../../src/search/page-searcher.js'
import type { PageSearcher } from '../../src/search/page-searcher.js'
import { flattenPages } from '../../src/renumber/tree.js'
import { NEW_PAGE_ID } from '../../src/types/book.js'
import type { Book } from '../../src/types/book.js'
import type { JSONValue } from '../../src/types/json.js'
import { deepCopy } from '../../src/types/json.js'
import { logger } from '../../src/logging/logger.js'
import { normalizeError } from '../../src/errors.js'

/**
 * Collaborators the book tools call into.
 */
export interface BookToolDependencies {
  client: Pick<ContentApiClient, 'listBooks' | 'getPage' | 'savePage' | 'uploadImage'>
  books: BookService
  searcher: PageSearcher
  renumber: RenumberService
}

const bookId = z.number().int().describe('Book identifier')
const pageId = z.number().int().describe('Page identifier, unique across all books')

const renumberInputSchema = z.object({
  book_id: bookId,
  start_page_id: z.number().int().describe('First page to renumber; later siblings and all their descendants follow'),
  offset: z.number().int().min(0).default(1).describe('How far to shift section numbers; 1 opens a gap for one new section'),
})

function previewToJson(preview: RenumberPreview): { [key: string]: JSONValue } {
  const { outcome } = preview
  return {
    bookId: preview.bookId,
    startPageId: preview.startPageId,
    offset: preview.offset,
    ok: outcome.ok,
    ...(outcome.ok ? {} : { reason: outcome.reason, message: outcome.message }),
    changes: preview.patches.map((patch) => ({
      pageId: patch.pageId,
      oldNumber: patch.oldNumber,
      newNumber: patch.newNumber,
      title: patch.after.title,
      changed: patch.changed,
      missing: patch.missing,
      diff: patch.diff,
    })),
  }
}

function applyToJson(result: RenumberApplyResult): JSONValue {
  return {
    ...previewToJson(result),
    writes: result.writes.map((write) =>
      write.ok ? { pageId: write.pageId, ok: true } : { pageId: write.pageId, ok: false, ...apiErrorToJson(write.error) }
    ),
  }
}

function bookToJson(book: Book): JSONValue {
  return deepCopy({ ...book, totalPages: flattenPages(book.pages).length })
}

/**
 * Creates the tools for reading and editing books.
 *
 * API failures come back as `{ error, message }` output rather than as tool
 * errors, so a model can read and react to them.
 *
 * @example
 * ```typescript
 * const tools = createBookTools({ client, books, searcher, renumber })
 * registry.register(Object.values(tools))
 *
 * const page = await tools.getPage.invoke({ page_id: 12 })
 * ```
 */
export function createBookTools(deps: BookToolDependencies) {
  const { client, books, searcher, renumber } = deps

  const dropCachedBook = async (id: number): Promise<void> => {
    try {
      await books.invalidate(id)
    } catch (error: unknown) {
      logger.warn(`[book-tools] could not drop cached book ${id}:`, normalizeError(error).message)
    }
  }

  const listMyBooks = tool({
    name: 'list_my_books',
    description: 'Lists every book written by the owner of the API token.',
    inputSchema: z.object({}),
    callback: async () =>
      toToolOutput(await client.listBooks(), (summaries) => ({
        books: deepCopy(summaries),
        totalCount: summaries.length,
      })),
  })

  const getBookInfo = tool({
    name: 'get_book_info',
    description:
      'Gets a book with its full page tree. Served from the local cache when it is fresh; set refresh to fetch it again.',
    inputSchema: z.object({
      book_id: bookId,
      refresh: z.boolean().default(false).describe('Bypass the cache'),
    }),
    callback: async (input) => toToolOutput(await books.getBook(input.book_id, { refresh: input.refresh }), bookToJson),
  })

  const getPage = tool({
    name: 'get_page',
    description: 'Gets one page by its identifier.',
    inputSchema: z.object({ page_id: pageId }),
    callback: async (input) => toToolOutput(await client.getPage(input.page_id)),
  })

  const createPage = tool({
    name: 'create_page',
    description:
      'Creates a new page in a book. Title and content are required; the parent page and visibility are optional.',
    inputSchema: z.object({
      book_id: bookId,
      title: z.string().describe('Page title, usually starting with its section number'),
      content: z.string().describe('Markdown body'),
      parent_id: pageId.optional().describe('Parent page; omit for a top-level page'),
      is_open: z.boolean().default(true).describe('Whether the page is published'),
    }),
    callback: async (input) => {
      const result = await client.savePage(NEW_PAGE_ID, {
        bookId: input.book_id,
        title: input.title,
        body: input.content,
        parentId: input.parent_id ?? null,
        isOpen: input.is_open,
      })
      if (result.ok) {
        await dropCachedBook(input.book_id)
      }
      return toToolOutput(result)
    },
  })

  const updatePage = tool({
    name: 'update_page',
    description:
      'Replaces the title, content, parent and visibility of an existing page. Only use page ids you have read from the book.',
    inputSchema: z.object({
      page_id: pageId,
      title: z.string(),
      content: z.string(),
      parent_id: pageId.nullable().describe('Parent page, or null for a top-level page'),
      is_open: z.boolean(),
      book_id: bookId.optional().describe('Book the page belongs to; its cached copy is dropped'),
    }),
    callback: async (input) => {
      const result = await client.savePage(input.page_id, {
        title: input.title,
        body: input.content,
        parentId: input.parent_id,
        isOpen: input.is_open,
      })
      if (result.ok && input.book_id !== undefined) {
        await dropCachedBook(input.book_id)
      }
      return toToolOutput(result)
    },
  })

  const uploadPageImage = tool({
    name: 'upload_page_image',
    description: 'Uploads an image file from the local disk and attaches it to a page.',
    inputSchema: z.object({
      page_id: pageId,
      file_path: z.string().describe('Path of the image on the local disk'),
    }),
    callback: async (input) => toToolOutput(await client.uploadImage('page', input.page_id, input.file_path)),
  })

  const searchPages = tool({
    name: 'search_pages',
    description:
      'Searches the titles and bodies of every page in a book and returns the best matches with a short preview.',
    inputSchema: z.object({
      book_id: bookId,
      query: z.string().describe('Words to look for'),
      max_results: z.number().int().min(1).default(20),
    }),
    callback: async (input) => {
      const book = await books.getBook(input.book_id)
      if (!book.ok) {
        return apiErrorToJson(book.error)
      }
      const results = searchBook(book.value, input.query, input.max_results)
      return { query: input.query, results: deepCopy(results), totalCount: results.length }
    },
  })

  const getBookStructure = tool({
    name: 'get_book_structure',
    description: 'Returns the table of contents of a book down to a depth, where 0 is the top level.',
    inputSchema: z.object({
      book_id: bookId,
      max_depth: z.number().int().min(0).default(2),
    }),
    callback: async (input) => {
      const book = await books.getBook(input.book_id)
      if (!book.ok) {
        return apiErrorToJson(book.error)
      }
      const structure = bookStructure(book.value, input.max_depth)
      return { bookId: input.book_id, title: book.value.title, structure: deepCopy(structure) }
    },
  })

  const getCacheInfo = tool({
    name: 'get_cache_info',
    description: 'Reports whether a book is cached locally, when it was cached and whether that copy is still fresh.',
    inputSchema: z.object({ book_id: bookId }),
    callback: async (input) => deepCopy(await searcher.getCacheInfo(input.book_id)),
  })

  const refreshBookCache = tool({
    name: 'refresh_book_cache',
    description: 'Fetches a book again and replaces its cached copy.',
    inputSchema: z.object({ book_id: bookId }),
    callback: async (input) =>
      toToolOutput(await books.getBook(input.book_id, { refresh: true }), (book) => ({
        bookId: book.id,
        title: book.title,
        totalPages: flattenPages(book.pages).length,
        refreshed: true,
      })),
  })

  const previewRenumbering = tool({
    name: 'preview_renumbering',
    description:
      'Shows how section numbers would shift from a page onwards, with a diff per page. Nothing is written.',
    inputSchema: renumberInputSchema,
    callback: async (input) =>
      toToolOutput(await renumber.preview(input.book_id, input.start_page_id, input.offset), previewToJson),
  })

  const applyRenumbering = tool({
    name: 'apply_renumbering',
    description:
      'Shifts section numbers from a page onwards and saves every changed page. Run preview_renumbering first.',
    inputSchema: renumberInputSchema,
    callback: async (input) =>
      toToolOutput(await renumber.apply(input.book_id, input.start_page_id, input.offset), applyToJson),
  })

  return {
    listMyBooks,
    getBookInfo,
    getPage,
    createPage,
    updatePage,
    uploadPageImage,
    searchPages,
    getBookStructure,
    getCacheInfo,
    refreshBookCache,
    previewRenumbering,
    applyRenumbering,
  }
}

export type BookTools = ReturnType<typeof createBookTools>
