import { z } from 'zod'
import type { JSONSchema } from '../types/json.js'

/**
 * Converts a Zod schema to JSON Schema format.
 * Strips the $schema property to reduce token usage. The schema describes
 * the input side, so fields with a default are not listed as required.
 *
 * @param schema - The Zod schema to convert
 * @returns JSON Schema representation
 */
export function zodSchemaToJsonSchema(schema: z.ZodType): JSONSchema {
  const result = z.toJSONSchema(schema, { io: 'input' }) as JSONSchema & { $schema?: string }
  const { $schema: _$schema, ...jsonSchema } = result
  return jsonSchema
}

/**
 * Formats a Zod validation error as a single readable line.
 *
 * @param error - The validation error
 * @returns Issues joined as `path: message`
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}
