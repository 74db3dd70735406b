export { PageSearcher, searchBook, bookStructure, normalizeText, scorePage, contentPreview } from './page-searcher.js'
export type { BookStructureEntry, CacheStatus, MatchType, PageSearchResult } from './page-searcher.js'
