import type { ToolResult, ToolSpec, ToolUse } from './types.js'
import { normalizeError } from '../errors.js'

export type { ToolSpec } from './types.js'

/**
 * Context provided to tool implementations during execution.
 */
export interface ToolContext {
  /**
   * The tool use request that triggered this tool execution.
   * Contains the tool name, toolUseId, and input parameters.
   */
  toolUse: ToolUse

  /**
   * Caller-owned state shared by every tool call of one invocation.
   */
  invocationState: Record<string, unknown>
}

/**
 * Event yielded during tool execution to report streaming progress.
 * Tools can yield zero or more of these events before returning the final ToolResult.
 */
export interface ToolStreamEvent {
  /**
   * Discriminator for tool stream events.
   */
  type: 'toolStreamEvent'

  /**
   * Caller-provided data for the progress update.
   */
  data?: unknown
}

/**
 * Type alias for the async generator returned by tool stream methods.
 * Yields ToolStreamEvents during execution and returns a ToolResult.
 */
export type ToolStreamGenerator = AsyncGenerator<ToolStreamEvent, ToolResult, undefined>

/**
 * Interface for tool implementations.
 *
 * Tools yield progress events while they run and finish with exactly one
 * ToolResult. Most implementations should use FunctionTool or the zod-based
 * `tool()` factory rather than implementing this interface directly.
 */
export interface Tool {
  /**
   * The unique name of the tool.
   * This MUST match the name in the toolSpec.
   */
  readonly name: string

  /**
   * Human-readable description of what the tool does.
   * This MUST match the description in the toolSpec.description.
   */
  readonly description: string

  /**
   * JSON specification for the tool.
   */
  readonly toolSpec: ToolSpec

  /**
   * Executes the tool with streaming support.
   *
   * @param toolContext - Context information including the tool use request and invocation state
   * @returns Async generator that yields ToolStreamEvents and returns a ToolResult
   *
   * @example
   * ```typescript
   * const generator = tool.stream({
   *   toolUse: { name: 'get_page', toolUseId: 'call-1', input: { page_id: 12 } },
   *   invocationState: {},
   * })
   * let step = await generator.next()
   * while (!step.done) {
   *   step = await generator.next()
   * }
   * console.log(step.value.status)
   * ```
   */
  stream(toolContext: ToolContext): ToolStreamGenerator
}

/**
 * Extended tool interface that supports direct invocation with type-safe input and output.
 * This interface is useful for testing and standalone tool execution.
 *
 * @typeParam TInput - Type for the tool's input parameters
 * @typeParam TReturn - Type for the tool's return value
 */
export interface InvokableTool<TInput, TReturn> extends Tool {
  /**
   * Invokes the tool directly with type-safe input and returns the unwrapped result.
   *
   * Unlike stream(), this method:
   * - Returns the raw result (not wrapped in ToolResult)
   * - Consumes async generators and returns only the final value
   * - Lets errors throw naturally (not wrapped in error ToolResult)
   */
  invoke(input: TInput, context?: ToolContext): Promise<TReturn>
}

/**
 * Checks whether a callback result is an async generator.
 */
export function isAsyncGenerator<TYield, TReturn>(value: unknown): value is AsyncGenerator<TYield, TReturn, never> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value && 'next' in value
}

/**
 * Creates an error ToolResult from an error object.
 * Keeps the normalized error on the result for callers that want to inspect it.
 *
 * @param error - The error that occurred (can be Error object or any thrown value)
 * @param toolUseId - The tool use ID for the ToolResult
 */
export function createErrorResult(error: unknown, toolUseId: string): ToolResult {
  const errorObject = normalizeError(error)

  return {
    toolUseId,
    status: 'error',
    content: [
      {
        type: 'toolResultTextContent',
        text: `Error: ${errorObject.message}`,
      },
    ],
    error: errorObject,
  }
}
