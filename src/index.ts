/**
 * Main entry point for Booksmith.
 *
 * Exposes the renumbering engine, the content API client, caching, search and
 * the tool framework. The agent tools themselves live under `vended_tools/`.
 */

// Error types
export { CacheError, ConfigurationError, normalizeError } from './errors.js'

// Configuration
export { loadConfig, DEFAULT_CACHE_DIR } from './config.js'
export type { BooksmithConfig } from './config.js'

// JSON types
export type { JSONSchema, JSONValue } from './types/json.js'

// Domain types
export { NEW_PAGE_ID } from './types/book.js'
export type { Book, BookSummary, DottedNumber, Page, PageFields } from './types/book.js'
export type { BlogPostFields } from './types/blog.js'

// Renumbering engine
export {
  getPageNumber,
  incrementLast,
  replacePrefix,
  locateSiblings,
  findParent,
  findPage,
  collectTargets,
  flattenPages,
  planRenumber,
  analyzeRenumber,
  applyRenumbering,
  makeDiff,
  buildRenumberPatches,
} from './renumber/index.js'
export type {
  PagePatch,
  PagePlacement,
  PageText,
  PatchedText,
  PlanEntry,
  RenumberIssue,
  RenumberOutcome,
  SiblingLocation,
} from './renumber/index.js'

// Content API
export { ContentApiClient, DEFAULT_CONTENT_API_URL, apiErrorToJson, toToolOutput } from './content-api/index.js'
export type { ApiError, ApiErrorKind, ApiResult, ContentApiClientConfig, ImageTarget } from './content-api/index.js'

// Cache, services and search
export { FileBookCache } from './cache/index.js'
export type { BookCache, BookCacheInfo, BookCacheMetadata, FileBookCacheConfig } from './cache/index.js'
export { BookService, RenumberService } from './books/index.js'
export type {
  BookSource,
  GetBookOptions,
  PageWriteResult,
  PageWriter,
  RenumberApplyResult,
  RenumberPreview,
} from './books/index.js'
export { PageSearcher, searchBook, bookStructure } from './search/index.js'
export type { BookStructureEntry, CacheStatus, MatchType, PageSearchResult } from './search/index.js'

// Tool types
export type {
  ToolSpec,
  ToolUse,
  ToolResultTextContent,
  ToolResultJsonContent,
  ToolResultContent,
  ToolResultStatus,
  ToolResult,
} from './tools/types.js'

// Tool interface and related types
export type { Tool, InvokableTool, ToolContext, ToolStreamEvent, ToolStreamGenerator } from './tools/tool.js'

// FunctionTool implementation
export { FunctionTool } from './tools/function-tool.js'
export type { FunctionToolCallback, FunctionToolConfig } from './tools/function-tool.js'

// Tool factory function
export { tool } from './tools/zod-tool.js'
export type { ToolConfig } from './tools/zod-tool.js'

// ToolRegistry implementation
export { ToolRegistry } from './tools/registry.js'

// MCP server
export { createMcpServer, SERVER_INSTRUCTIONS } from './mcp/index.js'
export type { McpServerOptions } from './mcp/index.js'

// Logging
export { configureLogging, createConsoleLogger } from './logging/index.js'
export type { Logger, LogLevel } from './logging/index.js'
