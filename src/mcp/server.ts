import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js'
import { v4 as uuidv4 } from 'uuid'
import type { ToolRegistry } from '../tools/registry.js'
import type { Tool } from '../tools/tool.js'
import type { ToolResult, ToolResultContent } from '../tools/types.js'
import { deepCopy } from '../types/json.js'
import type { JSONSchema } from '../types/json.js'
import { logger } from '../logging/logger.js'

export const SERVER_NAME = 'booksmith'
export const SERVER_VERSION = '0.1.0'

/**
 * Guidance sent to clients when they connect.
 */
export const SERVER_INSTRUCTIONS = `This server reads and edits books and blog posts on the content service.

Usage:
- Use create_page to add a page to a book. Use update_page only for pages that already exist.
- If create_page is interrupted, do not retry with update_page on a guessed page id.
- Never call update_page with a page id you have not read from the book.
- Run preview_renumbering before apply_renumbering and check the diffs.

Note:
- Page ids are unique across the whole service, not only within a book.`

export interface McpServerOptions {
  name?: string
  version?: string
  instructions?: string
}

interface TextContent {
  type: 'text'
  text: string
}

function toTextContent(content: ToolResultContent): TextContent {
  return content.type === 'toolResultTextContent'
    ? { type: 'text', text: content.text }
    : { type: 'text', text: JSON.stringify(content.json, null, 2) }
}

interface McpInputSchema {
  type: 'object'
  properties: Record<string, object>
  required?: string[]
  [key: string]: unknown
}

/**
 * MCP requires an object schema whose properties are schemas, never booleans.
 */
function toMcpInputSchema(schema: JSONSchema): McpInputSchema {
  const properties: Record<string, object> = {}
  for (const [key, value] of Object.entries(schema.properties ?? {})) {
    if (typeof value === 'object') {
      properties[key] = value
    }
  }
  return { ...schema, type: 'object', properties }
}

async function runTool(tool: Tool, input: Record<string, unknown>): Promise<ToolResult> {
  const generator = tool.stream({
    toolUse: { name: tool.name, toolUseId: uuidv4(), input: deepCopy(input) },
    invocationState: {},
  })
  let step = await generator.next()
  while (!step.done) {
    step = await generator.next()
  }
  return step.value
}

/**
 * Creates an MCP server that lists and calls every tool in a registry.
 *
 * The registry is read on every request, so tools registered after the server
 * is created are served as well.
 *
 * @example
 * ```typescript
 * const server = createMcpServer(registry)
 * await server.connect(new StdioServerTransport())
 * ```
 */
export function createMcpServer(registry: ToolRegistry, options: McpServerOptions = {}): Server {
  const server = new Server(
    {
      name: options.name ?? SERVER_NAME,
      version: options.version ?? SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: options.instructions ?? SERVER_INSTRUCTIONS,
    }
  )

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toMcpInputSchema(tool.toolSpec.inputSchema),
    })),
  }))

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params

    if (!registry.has(name)) {
      return {
        isError: true,
        content: [{ type: 'text' as const, text: `Unknown tool: ${name}` }],
      }
    }

    logger.debug(`[mcp] calling ${name}`)
    const result = await runTool(registry.get(name), args ?? {})

    return {
      isError: result.status === 'error',
      content: result.content.map(toTextContent),
    }
  })

  return server
}
