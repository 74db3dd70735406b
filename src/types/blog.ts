/**
 * Writable fields of a blog post.
 *
 * Blog responses are passed through as JSON; only what Booksmith sends is typed.
 */
export interface BlogPostFields {
  title: string
  content: string
  isPublic: boolean
  /** Comma-separated tags, as the service stores them. */
  tags: string
}
