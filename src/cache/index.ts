export { FileBookCache } from './book-cache.js'
export type { BookCache, BookCacheInfo, BookCacheMetadata, FileBookCacheConfig } from './book-cache.js'
