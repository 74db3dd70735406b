import type { JSONSchema, JSONValue } from '../types/json.js'

/**
 * Status of a tool execution.
 * Indicates whether the tool executed successfully or encountered an error.
 */
export type ToolResultStatus = 'success' | 'error'

/**
 * Specification for a tool that can be used by the model.
 * Defines the tool's name, description, and input schema.
 */
export interface ToolSpec {
  /**
   * The unique name of the tool.
   */
  name: string

  /**
   * A description of what the tool does.
   * This helps the model understand when to use the tool.
   */
  description: string

  /**
   * JSON Schema defining the expected input structure for the tool.
   * Tools without arguments use an empty object schema.
   */
  inputSchema: JSONSchema
}

/**
 * Represents a tool usage request from the model.
 */
export interface ToolUse {
  /**
   * The name of the tool to execute.
   */
  name: string

  /**
   * Unique identifier for this tool use instance.
   * Used to match tool results back to their requests.
   */
  toolUseId: string

  /**
   * The input parameters for the tool.
   */
  input: JSONValue
}

/**
 * Text content of a tool result.
 */
export interface ToolResultTextContent {
  type: 'toolResultTextContent'
  text: string
}

/**
 * Structured JSON content of a tool result.
 */
export interface ToolResultJsonContent {
  type: 'toolResultJsonContent'
  json: JSONValue
}

/**
 * Content block of a tool result.
 */
export type ToolResultContent = ToolResultTextContent | ToolResultJsonContent

/**
 * Final outcome of a tool execution.
 */
export interface ToolResult {
  /**
   * The tool use ID this result answers.
   */
  toolUseId: string

  /**
   * Whether the tool succeeded.
   */
  status: ToolResultStatus

  /**
   * Content returned to the caller.
   */
  content: ToolResultContent[]

  /**
   * The original error when status is 'error', kept for inspection by callers.
   */
  error?: Error
}
