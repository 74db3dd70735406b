import { createErrorResult, isAsyncGenerator } from './tool.js'
import type { InvokableTool, ToolContext, ToolStreamGenerator } from './tool.js'
import type { ToolSpec, ToolResult } from './types.js'
import type { JSONSchema, JSONValue } from '../types/json.js'
import { deepCopy } from '../types/json.js'
import { logger } from '../logging/logger.js'

/**
 * Callback function for FunctionTool implementations.
 * The callback can return values in multiple ways, and FunctionTool handles the conversion to ToolResult.
 *
 * @param input - The input parameters conforming to the tool's inputSchema
 * @param toolContext - The tool execution context with invocation state
 * @returns Can return:
 *   - AsyncGenerator: Each yielded value becomes a ToolStreamEvent, final value wrapped in ToolResult
 *   - Promise: Resolved value is wrapped in ToolResult
 *   - Synchronous value: Value is wrapped in ToolResult
 *   - If an error is thrown, it's handled and returned as an error ToolResult
 */
export type FunctionToolCallback = (
  input: unknown,
  toolContext: ToolContext
) => AsyncGenerator<JSONValue, JSONValue, never> | Promise<JSONValue> | JSONValue

/**
 * Configuration options for creating a FunctionTool.
 */
export interface FunctionToolConfig {
  /** The unique name of the tool */
  name: string
  /** Human-readable description of the tool's purpose */
  description: string
  /** JSON Schema defining the expected input structure */
  inputSchema: JSONSchema
  /** Function that implements the tool logic */
  callback: FunctionToolCallback
}

/**
 * A Tool implementation that wraps a callback function and handles all ToolResult conversion.
 *
 * All return values are wrapped in a ToolResult, and errors are caught and
 * returned as error ToolResults.
 *
 * @example
 * ```typescript
 * const echo = new FunctionTool({
 *   name: 'echo',
 *   description: 'Returns its input',
 *   inputSchema: { type: 'object', properties: { text: { type: 'string' } }, required: ['text'] },
 *   callback: (input) => input as JSONValue,
 * })
 * ```
 */
export class FunctionTool implements InvokableTool<JSONValue, JSONValue> {
  /**
   * The unique name of the tool.
   */
  readonly name: string

  /**
   * Human-readable description of what the tool does.
   */
  readonly description: string

  /**
   * JSON specification for the tool.
   */
  readonly toolSpec: ToolSpec

  /**
   * The callback function that implements the tool's logic.
   */
  private readonly _callback: FunctionToolCallback

  constructor(config: FunctionToolConfig) {
    this.name = config.name
    this.description = config.description
    this.toolSpec = {
      name: config.name,
      description: config.description,
      inputSchema: config.inputSchema,
    }
    this._callback = config.callback
  }

  /**
   * Executes the tool with streaming support.
   * Handles all callback patterns (async generator, promise, sync) and converts results to ToolResult.
   *
   * @param toolContext - Context information including the tool use request and invocation state
   */
  async *stream(toolContext: ToolContext): ToolStreamGenerator {
    const { toolUse } = toolContext

    try {
      const result = this._callback(toolUse.input, toolContext)

      if (isAsyncGenerator<JSONValue, JSONValue>(result)) {
        // Each yielded value becomes a ToolStreamEvent; the return value becomes the result
        let iterResult = await result.next()

        while (!iterResult.done) {
          yield {
            type: 'toolStreamEvent',
            data: iterResult.value,
          }
          iterResult = await result.next()
        }

        return this._wrapInToolResult(iterResult.value, toolUse.toolUseId)
      }

      const value = await result
      return this._wrapInToolResult(value, toolUse.toolUseId)
    } catch (error) {
      logger.warn(`[tools] ${this.name} failed:`, error)
      return createErrorResult(error, toolUse.toolUseId)
    }
  }

  /**
   * Invokes the tool directly and returns the unwrapped result.
   * This is useful for testing and standalone tool execution.
   *
   * @param input - The input parameters for the tool
   * @param context - Optional tool execution context
   */
  async invoke(input: JSONValue, context?: ToolContext): Promise<JSONValue> {
    const toolContext: ToolContext = context ?? {
      toolUse: {
        name: this.name,
        toolUseId: 'direct-invocation',
        input,
      },
      invocationState: {},
    }

    const result = this._callback(input, toolContext)

    if (isAsyncGenerator<JSONValue, JSONValue>(result)) {
      let iterResult = await result.next()
      while (!iterResult.done) {
        iterResult = await result.next()
      }
      return iterResult.value
    }

    return await result
  }

  /**
   * Wraps a value in a ToolResult with success status.
   *
   * - Strings, numbers and booleans become text content
   * - null becomes the text `<null>`
   * - Objects become JSON content (deep copied)
   * - Arrays become JSON content wrapped in `{ $value: array }`
   */
  private _wrapInToolResult(value: JSONValue, toolUseId: string): ToolResult {
    try {
      if (value === null) {
        return {
          toolUseId,
          status: 'success',
          content: [{ type: 'toolResultTextContent', text: '<null>' }],
        }
      }

      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return {
          toolUseId,
          status: 'success',
          content: [{ type: 'toolResultTextContent', text: String(value) }],
        }
      }

      if (Array.isArray(value)) {
        return {
          toolUseId,
          status: 'success',
          content: [{ type: 'toolResultJsonContent', json: { $value: deepCopy(value) } }],
        }
      }

      return {
        toolUseId,
        status: 'success',
        content: [{ type: 'toolResultJsonContent', json: deepCopy(value) }],
      }
    } catch (error) {
      // Circular references or non-serializable values
      return createErrorResult(error, toolUseId)
    }
  }
}
