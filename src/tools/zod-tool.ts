import { isAsyncGenerator } from './tool.js'
import type { InvokableTool, ToolContext, ToolStreamGenerator } from './tool.js'
import type { ToolSpec } from './types.js'
import type { JSONValue } from '../types/json.js'
import { FunctionTool } from './function-tool.js'
import { formatZodError, zodSchemaToJsonSchema } from '../utils/zod.js'
import type { z } from 'zod'

/**
 * Return shapes accepted from a zod tool callback.
 */
type ToolCallbackResult<TReturn extends JSONValue> = AsyncGenerator<JSONValue, TReturn, never> | Promise<TReturn> | TReturn

/**
 * Configuration for creating a Zod-based tool.
 *
 * @typeParam TInput - Zod schema type for input validation
 * @typeParam TReturn - Return type of the callback function
 */
export interface ToolConfig<TInput extends z.ZodType, TReturn extends JSONValue = JSONValue> {
  /** The name of the tool */
  name: string

  /** A description of what the tool does (optional) */
  description?: string

  /** Zod schema for input validation and JSON schema generation */
  inputSchema: TInput

  /**
   * Callback function that implements the tool's functionality.
   *
   * @param input - Validated input matching the Zod schema
   * @param context - Optional execution context
   * @returns The result (can be a value, Promise, or AsyncGenerator)
   */
  callback: (input: z.infer<TInput>, context?: ToolContext) => ToolCallbackResult<TReturn>
}

/**
 * Internal implementation of a Zod-based tool.
 */
class ZodTool<TInput extends z.ZodType, TReturn extends JSONValue = JSONValue>
  implements InvokableTool<z.input<TInput>, TReturn>
{
  /**
   * Internal FunctionTool for delegating stream operations.
   */
  private readonly _functionTool: FunctionTool

  /**
   * Zod schema for input validation.
   */
  private readonly _inputSchema: TInput

  /**
   * User callback function.
   */
  private readonly _callback: (input: z.infer<TInput>, context?: ToolContext) => ToolCallbackResult<TReturn>

  constructor(config: ToolConfig<TInput, TReturn>) {
    const { name, description = '', inputSchema, callback } = config

    this._inputSchema = inputSchema
    this._callback = callback

    this._functionTool = new FunctionTool({
      name,
      description,
      inputSchema: zodSchemaToJsonSchema(inputSchema),
      callback: (input: unknown, toolContext: ToolContext): ToolCallbackResult<TReturn> =>
        callback(this._parse(input), toolContext),
    })
  }

  /**
   * The unique name of the tool.
   */
  get name(): string {
    return this._functionTool.name
  }

  /**
   * Human-readable description of what the tool does.
   */
  get description(): string {
    return this._functionTool.description
  }

  /**
   * JSON specification for the tool.
   */
  get toolSpec(): ToolSpec {
    return this._functionTool.toolSpec
  }

  /**
   * Executes the tool with streaming support.
   * Delegates to internal FunctionTool implementation.
   */
  stream(toolContext: ToolContext): ToolStreamGenerator {
    return this._functionTool.stream(toolContext)
  }

  /**
   * Invokes the tool directly with type-safe input and returns the unwrapped result.
   * Validation errors and callback errors are thrown.
   */
  async invoke(input: z.input<TInput>, context?: ToolContext): Promise<TReturn> {
    const result = this._callback(this._parse(input), context)

    if (isAsyncGenerator<JSONValue, TReturn>(result)) {
      let iterResult = await result.next()
      while (!iterResult.done) {
        iterResult = await result.next()
      }
      return iterResult.value
    }

    return await result
  }

  /**
   * Validates input against the schema.
   *
   * @throws Error listing every validation issue
   */
  private _parse(input: unknown): z.infer<TInput> {
    const parsed = this._inputSchema.safeParse(input)
    if (!parsed.success) {
      throw new Error(`Invalid input for ${this.name}: ${formatZodError(parsed.error)}`)
    }
    return parsed.data
  }
}

/**
 * Creates an InvokableTool from a Zod schema and callback function.
 *
 * The tool() function validates input against the schema and generates JSON schema
 * for model providers using Zod v4's built-in z.toJSONSchema() method.
 *
 * @example
 * ```typescript
 * import { tool } from 'booksmith'
 * import { z } from 'zod'
 *
 * const pageNumber = tool({
 *   name: 'page_number',
 *   description: 'Extracts the section number from a page title',
 *   inputSchema: z.object({ title: z.string() }),
 *   callback: (input) => getPageNumber(input.title) ?? null,
 * })
 *
 * const result = await pageNumber.invoke({ title: '5.2. Setup' })
 * ```
 *
 * @typeParam TInput - Zod schema type for input validation
 * @typeParam TReturn - Return type of the callback function
 * @param config - Tool configuration
 * @returns An InvokableTool that implements the Tool interface with invoke() method
 */
export function tool<TInput extends z.ZodType, TReturn extends JSONValue = JSONValue>(
  config: ToolConfig<TInput, TReturn>
): InvokableTool<z.input<TInput>, TReturn> {
  return new ZodTool(config)
}
