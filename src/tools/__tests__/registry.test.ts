import { describe, it, expect, beforeEach } from 'vitest'
import { z } from 'zod'
import { ToolRegistry } from '../registry.js'
import { tool } from '../zod-tool.js'

function createNamedTool(name: string) {
  return tool({ name, description: `Tool ${name}`, inputSchema: z.object({}), callback: () => name })
}

describe('ToolRegistry', () => {
  let registry: ToolRegistry

  beforeEach(() => {
    registry = new ToolRegistry()
  })

  it('registers single tools and arrays in order', () => {
    registry.register(createNamedTool('get_page'))
    registry.register([createNamedTool('create_page'), createNamedTool('update_page')])

    expect(registry.list().map((t) => t.name)).toEqual(['get_page', 'create_page', 'update_page'])
    expect(registry.specs().map((spec) => spec.description)).toEqual([
      'Tool get_page',
      'Tool create_page',
      'Tool update_page',
    ])
  })

  it('rejects duplicate names', () => {
    registry.register(createNamedTool('get_page'))

    expect(() => registry.register(createNamedTool('get_page'))).toThrow("Tool with name 'get_page' already registered")
  })

  it('rejects blank names', () => {
    expect(() => registry.register(createNamedTool('  '))).toThrow('Tool name must be a non-empty string')
  })

  it('looks tools up by name', () => {
    const getPage = createNamedTool('get_page')
    registry.register(getPage)

    expect(registry.get('get_page')).toBe(getPage)
    expect(registry.has('get_page')).toBe(true)
    expect(registry.has('missing')).toBe(false)
    expect(() => registry.get('missing')).toThrow("Tool with name 'missing' not found")
  })

  it('replaces a registration with a tool of the same name', () => {
    registry.register(createNamedTool('get_page'))
    const replacement = createNamedTool('get_page')

    registry.update('get_page', replacement)

    expect(registry.get('get_page')).toBe(replacement)
    expect(() => registry.update('get_page', createNamedTool('other'))).toThrow(
      "Tool name 'other' does not match parameter name 'get_page'"
    )
    expect(() => registry.update('missing', createNamedTool('missing'))).toThrow("Tool with name 'missing' not found")
  })

  it('removes tools', () => {
    registry.register(createNamedTool('get_page'))

    registry.remove('get_page')

    expect(registry.list()).toEqual([])
    expect(() => registry.remove('get_page')).toThrow("Tool with name 'get_page' not found")
  })
})
