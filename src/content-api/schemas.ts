/**
 * Wire format of the content API and its mapping to the domain model.
 *
 * The service names fields after its own database (`subject`, `content`,
 * `open_yn`); everything past this module uses the names in `types/book.ts`.
 */

import { z } from 'zod'
import type { Book, BookSummary, Page, PageFields } from '../types/book.js'
import type { BlogPostFields } from '../types/blog.js'
import type { JSONValue } from '../types/json.js'

/**
 * A page as the service sends it.
 */
export interface WirePage {
  id: number
  subject: string
  content?: string | null | undefined
  parent_id?: number | null | undefined
  depth?: number | undefined
  seq?: number | undefined
  open_yn?: string | undefined
  children?: WirePage[] | null | undefined
}

export const wirePageSchema: z.ZodType<WirePage> = z.lazy(() =>
  z.object({
    id: z.number(),
    subject: z.string(),
    content: z.string().nullish(),
    parent_id: z.number().nullish(),
    depth: z.number().optional(),
    seq: z.number().optional(),
    open_yn: z.string().optional(),
    children: z.array(wirePageSchema).nullish(),
  })
)

export const wireBookSummarySchema = z.object({
  id: z.number(),
  subject: z.string(),
  summary: z.string().nullish(),
})

export const wireBookSchema = wireBookSummarySchema.extend({
  pages: z.array(wirePageSchema).nullish(),
})

export const wireBookListSchema = z.array(wireBookSummarySchema)

export type WireBook = z.infer<typeof wireBookSchema>
export type WireBookSummary = z.infer<typeof wireBookSummarySchema>

/**
 * The service reports top-level pages with parent id 0.
 */
function toParentId(parentId: number | null | undefined): number | null {
  return parentId === undefined || parentId === null || parentId === 0 ? null : parentId
}

/**
 * Maps a wire page and its subtree to the domain model.
 *
 * Nested pages take their parent id and depth from their position in the tree.
 * The root falls back to what the service reported.
 */
export function toPage(wire: WirePage, parentId = toParentId(wire.parent_id), depth = wire.depth ?? 0): Page {
  return {
    id: wire.id,
    title: wire.subject,
    body: wire.content ?? '',
    parentId,
    depth,
    seq: wire.seq ?? 0,
    isOpen: wire.open_yn !== 'N',
    children: (wire.children ?? []).map((child, index) =>
      toPage({ ...child, seq: child.seq ?? index }, wire.id, depth + 1)
    ),
  }
}

export function toBookSummary(wire: WireBookSummary): BookSummary {
  return { id: wire.id, title: wire.subject, summary: wire.summary ?? '' }
}

export function toBook(wire: WireBook): Book {
  return {
    ...toBookSummary(wire),
    pages: (wire.pages ?? []).map((page, index) => toPage({ ...page, seq: page.seq ?? index }, null, 0)),
  }
}

/**
 * Builds the request body for saving a page.
 *
 * Depth and sequence are always sent as 0 so the service keeps the page where
 * it already is.
 */
export function toWirePageFields(pageId: number, fields: PageFields): { [key: string]: JSONValue } {
  return {
    id: pageId < 0 ? 0 : pageId,
    subject: fields.title,
    content: fields.body,
    parent_id: fields.parentId ?? 0,
    depth: 0,
    seq: 0,
    book_id: fields.bookId ?? 0,
    open_yn: fields.isOpen ? 'Y' : 'N',
  }
}

export function toWireBlogPost(post: BlogPostFields): { [key: string]: JSONValue } {
  return {
    title: post.title,
    content: post.content,
    is_public: post.isPublic,
    tags: post.tags,
  }
}
