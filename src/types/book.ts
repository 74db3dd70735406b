/**
 * Domain model for books and their pages.
 *
 * A book holds an ordered forest of pages: several top-level pages can sit side
 * by side at depth 0, and each page owns an ordered list of children. Order in
 * every list is significant and is never changed by Booksmith.
 */

/**
 * A period-joined run of integers taken from the start of a page title, for
 * example `"5.2.1"`. It is derived from the title, never stored on its own.
 */
export type DottedNumber = string

/**
 * A node in a book's page hierarchy.
 */
export interface Page {
  /** Identifier, unique across every book on the content service. */
  id: number

  /** Page title. Usually starts with a dotted section number such as `"5.2. Setup"`. */
  title: string

  /** Markdown body. */
  body: string

  /** Identifier of the parent page, or null for a top-level page. */
  parentId: number | null

  /** Length of the ancestor chain. Redundant with the tree position. */
  depth: number

  /** Position among siblings as reported by the content service. */
  seq: number

  /** Whether the page is published. */
  isOpen: boolean

  /** Child pages in document order. */
  children: Page[]
}

/**
 * A book with its full page forest.
 */
export interface Book {
  id: number
  title: string
  summary: string
  pages: Page[]
}

/**
 * A book as listed without its pages.
 */
export interface BookSummary {
  id: number
  title: string
  summary: string
}

/**
 * Writable fields of a page.
 */
export interface PageFields {
  /** Owning book. Only meaningful when creating a page. */
  bookId?: number
  title: string
  body: string
  parentId: number | null
  isOpen: boolean
}

/**
 * Identifier used with {@link PageFields} to ask the content service for a new page.
 */
export const NEW_PAGE_ID = -1
