/**
 * Agent tools for the blog side of the content service.
 */

export { createBlogTools } from './blog-tools.js'
export type { BlogClient, BlogTools } from './blog-tools.js'
