/**
 * Test fixtures and helpers for Tool testing.
 */

import type { ToolContext } from '../tools/tool.js'
import type { JSONValue } from '../types/json.js'

/**
 * Helper to create a mock ToolContext for testing.
 *
 * @param toolUse - The tool use request
 * @param invocationState - Optional initial invocation state
 */
export function createMockContext(
  toolUse: { name: string; toolUseId: string; input: JSONValue },
  invocationState: Record<string, unknown> = {}
): ToolContext {
  return { toolUse, invocationState }
}

/**
 * Drains an async generator, returning what it yielded and what it returned.
 */
export async function collectGenerator<E, R>(generator: AsyncGenerator<E, R, undefined>): Promise<{ items: E[]; result: R }> {
  const items: E[] = []
  let step = await generator.next()
  while (!step.done) {
    items.push(step.value)
    step = await generator.next()
  }
  return { items, result: step.value }
}
