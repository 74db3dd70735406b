#!/usr/bin/env node
import 'dotenv/config'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { loadConfig } from './config.js'
import { ContentApiClient } from './content-api/client.js'
import { FileBookCache } from './cache/book-cache.js'
import { BookService } from './books/book-service.js'
import { RenumberService } from './books/renumber-service.js'
import { PageSearcher } from './search/page-searcher.js'
import { ToolRegistry } from './tools/registry.js'
import { createMcpServer } from './mcp/server.js'
import { configureLogging, createConsoleLogger, logger } from './logging/logger.js'
import { normalizeError } from './errors.js'
import { createBookTools } from '../vended_tools/book/index.js'
import { createBlogTools } from '../vended_tools/blog/index.js'

/**
 * Builds the full tool registry from configuration and serves it over stdio.
 */
async function main(): Promise<void> {
  const config = loadConfig(process.env)
  configureLogging(createConsoleLogger(config.logLevel))

  const client = new ContentApiClient({ baseUrl: config.apiUrl, token: config.apiToken })
  if (config.apiToken === undefined) {
    logger.warn('[cli] CONTENT_API_TOKEN is not set; every API call will fail')
  }

  const cache = new FileBookCache({ directory: config.cacheDir, maxAgeHours: config.cacheMaxAgeHours })
  const books = new BookService(client, cache)
  const registry = new ToolRegistry()
  registry.register(
    Object.values(
      createBookTools({
        client,
        books,
        searcher: new PageSearcher(cache),
        renumber: new RenumberService(books, client),
      })
    )
  )
  registry.register(Object.values(createBlogTools(client)))

  const server = createMcpServer(registry)
  await server.connect(new StdioServerTransport())
  logger.info(`[cli] serving ${registry.list().length} tools on stdio, cache in ${config.cacheDir}`)
}

main().catch((error: unknown) => {
  logger.error('[cli] failed to start:', normalizeError(error).message)
  process.exitCode = 1
})
