import type { JSONSchema7 } from 'json-schema'

/**
 * Represents any valid JSON value.
 *
 * Tool callbacks return this type so results can be handed to a model or an
 * MCP client without further conversion.
 *
 * @example
 * ```typescript
 * const value: JSONValue = { pageId: 12, changed: true, numbers: ['5.2', '5.3'] }
 * ```
 */
export type JSONValue = string | number | boolean | null | { [key: string]: JSONValue } | JSONValue[]

/**
 * Represents a JSON Schema definition (Draft 7).
 * Used for describing tool inputs to models and MCP clients.
 */
export type JSONSchema = JSONSchema7

/**
 * Creates a deep copy of a value using JSON serialization.
 *
 * Fields holding `undefined` are dropped, which is how optional domain fields
 * become JSON.
 *
 * @param value - The value to copy
 * @returns A deep copy of the value
 * @throws Error if the value cannot be JSON serialized
 */
export function deepCopy(value: unknown): JSONValue {
  try {
    return JSON.parse(JSON.stringify(value)) as JSONValue
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error)
    throw new Error(`Unable to serialize tool result: ${errorMessage}`)
  }
}
