/**
 * Agent tools for reading, searching and renumbering books.
 *
 * @example
 * ```typescript
 * import { createBookTools } from 'booksmith/vended_tools/book'
 *
 * const tools = createBookTools({ client, books, searcher, renumber })
 * const preview = await tools.previewRenumbering.invoke({ book_id: 7, start_page_id: 102 })
 * ```
 */

export { createBookTools } from './book-tools.js'
export type { BookToolDependencies, BookTools } from './book-tools.js'
