import type { BookCache, BookCacheInfo } from '../cache/book-cache.js'
import type { Book, Page } from '../types/book.js'
import { walkForest } from '../renumber/tree.js'

const PREVIEW_LENGTH = 100

/**
 * Where a search query matched.
 */
export type MatchType = 'title_match' | 'content_match' | 'partial_match'

/**
 * A page that matched a search, with its relevance score.
 */
export interface PageSearchResult {
  id: number
  title: string
  contentPreview: string
  depth: number
  parentId: number | null
  seq: number
  score: number
  matchType: MatchType
}

/**
 * One line of a book's table of contents.
 */
export interface BookStructureEntry {
  id: number
  title: string
  depth: number
  parentId: number | null
  seq: number
  hasContent: boolean
}

export type CacheStatus = { cached: false } | ({ cached: true } & BookCacheInfo)

/**
 * Lower-cases text and reduces it to words: tags are dropped, punctuation
 * becomes a space and runs of whitespace collapse to one.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase()
}

/**
 * Counts non-overlapping occurrences of `needle`.
 */
function countOccurrences(text: string, needle: string): number {
  if (needle === '') {
    return 0
  }
  let count = 0
  let index = text.indexOf(needle)
  while (index !== -1) {
    count++
    index = text.indexOf(needle, index + needle.length)
  }
  return count
}

/**
 * Scores a page against a normalised query.
 *
 * The whole query in the title is worth 10, plus 5 when the title is exactly
 * the query. Each occurrence in the body is worth 2. Each query word longer
 * than one character adds 3 when it is in the title and 0.5 per body
 * occurrence.
 */
export function scorePage(title: string, body: string, query: string): number {
  let score = 0

  if (title.includes(query)) {
    score += 10
    if (title === query) {
      score += 5
    }
  }

  score += countOccurrences(body, query) * 2

  for (const word of query.split(' ')) {
    if (word.length > 1) {
      if (title.includes(word)) {
        score += 3
      }
      score += countOccurrences(body, word) * 0.5
    }
  }

  return score
}

function matchTypeOf(title: string, body: string, query: string): MatchType {
  if (title.includes(query)) {
    return 'title_match'
  }
  return body.includes(query) ? 'content_match' : 'partial_match'
}

/**
 * Excerpt of the body around the first case-insensitive occurrence of the
 * query, or its opening when the query does not occur verbatim.
 */
export function contentPreview(body: string, query: string): string {
  const index = query.trim() === '' ? -1 : body.toLowerCase().indexOf(query.trim().toLowerCase())
  if (index === -1) {
    return body.length > PREVIEW_LENGTH ? `${body.slice(0, PREVIEW_LENGTH)}...` : body
  }

  const half = PREVIEW_LENGTH / 2
  const start = Math.max(0, index - half)
  const end = Math.min(body.length, index + query.trim().length + half)

  let preview = body.slice(start, end)
  if (start > 0) {
    preview = `...${preview}`
  }
  if (end < body.length) {
    preview = `${preview}...`
  }
  return preview
}

/**
 * Ranks every page of a book against a query.
 *
 * @param maxResults - Upper bound on returned results
 * @returns Pages with a positive score, best first
 */
export function searchBook(book: Book, query: string, maxResults = 20): PageSearchResult[] {
  const normalizedQuery = normalizeText(query)
  if (normalizedQuery === '') {
    return []
  }

  const results: PageSearchResult[] = []
  for (const page of walkForest(book.pages)) {
    const title = normalizeText(page.title)
    const body = normalizeText(page.body)
    const score = scorePage(title, body, normalizedQuery)
    if (score > 0) {
      results.push({
        id: page.id,
        title: page.title,
        contentPreview: contentPreview(page.body, query),
        depth: page.depth,
        parentId: page.parentId,
        seq: page.seq,
        score,
        matchType: matchTypeOf(title, body, normalizedQuery),
      })
    }
  }

  return results.sort((a, b) => b.score - a.score).slice(0, maxResults)
}

/**
 * Table of contents of a book, down to `maxDepth` (0 is top level).
 */
export function bookStructure(book: Book, maxDepth = 2): BookStructureEntry[] {
  const entries: BookStructureEntry[] = []
  for (const page of walkForest(book.pages)) {
    if (page.depth <= maxDepth) {
      entries.push(toStructureEntry(page))
    }
  }
  return entries
}

/**
 * Searches and summarises books held in a {@link BookCache}.
 *
 * Nothing here reaches the content API: a book that is not cached yields no
 * results.
 */
export class PageSearcher {
  private readonly _cache: BookCache

  constructor(cache: BookCache) {
    this._cache = cache
  }

  /**
   * Ranks every page of a cached book against a query.
   *
   * @param maxResults - Upper bound on returned results
   * @returns Pages with a positive score, best first
   */
  async searchPages(bookId: number, query: string, maxResults = 20): Promise<PageSearchResult[]> {
    const book = await this._cache.load(bookId)
    return book === undefined ? [] : searchBook(book, query, maxResults)
  }

  /**
   * Table of contents of a cached book, down to `maxDepth` (0 is top level).
   */
  async getBookStructure(bookId: number, maxDepth = 2): Promise<BookStructureEntry[]> {
    const book = await this._cache.load(bookId)
    return book === undefined ? [] : bookStructure(book, maxDepth)
  }

  async getCacheInfo(bookId: number): Promise<CacheStatus> {
    const info = await this._cache.info(bookId)
    return info === undefined ? { cached: false } : { cached: true, ...info }
  }
}

function toStructureEntry(page: Page): BookStructureEntry {
  return {
    id: page.id,
    title: page.title,
    depth: page.depth,
    parentId: page.parentId,
    seq: page.seq,
    hasContent: page.body.trim() !== '',
  }
}
