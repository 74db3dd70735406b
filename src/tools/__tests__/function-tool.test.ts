import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { FunctionTool } from '../function-tool.js'
import type { FunctionToolCallback } from '../function-tool.js'
import { createMockContext, collectGenerator } from '../../__fixtures__/tool-helpers.js'
import { configureLogging, logger } from '../../logging/logger.js'

function createTool(callback: FunctionToolCallback): FunctionTool {
  return new FunctionTool({
    name: 'page_number',
    description: 'Extracts a section number',
    inputSchema: { type: 'object', properties: { title: { type: 'string' } } },
    callback,
  })
}

describe('FunctionTool', () => {
  let originalLogger: typeof logger
  const warn = vi.fn()

  beforeEach(() => {
    originalLogger = logger
    warn.mockReset()
    configureLogging({ debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() })
  })

  afterEach(() => {
    configureLogging(originalLogger)
  })

  it('builds its spec from the configuration', () => {
    const tool = createTool(() => 'ok')

    expect(tool.name).toBe('page_number')
    expect(tool.description).toBe('Extracts a section number')
    expect(tool.toolSpec).toEqual({
      name: 'page_number',
      description: 'Extracts a section number',
      inputSchema: { type: 'object', properties: { title: { type: 'string' } } },
    })
  })

  describe('stream', () => {
    it.each([
      ['a string', '5.2', { type: 'toolResultTextContent', text: '5.2' }],
      ['a number', 3, { type: 'toolResultTextContent', text: '3' }],
      ['a boolean', false, { type: 'toolResultTextContent', text: 'false' }],
      ['null', null, { type: 'toolResultTextContent', text: '<null>' }],
      ['an object', { changed: true }, { type: 'toolResultJsonContent', json: { changed: true } }],
      ['an array', ['5.2', '5.3'], { type: 'toolResultJsonContent', json: { $value: ['5.2', '5.3'] } }],
    ])('wraps %s in a success result', async (_label, value, content) => {
      const tool = createTool(() => value)

      const { result } = await collectGenerator(tool.stream(createMockContext({ name: 'page_number', toolUseId: 'call-1', input: {} })))

      expect(result).toEqual({ toolUseId: 'call-1', status: 'success', content: [content] })
    })

    it('awaits promises', async () => {
      const tool = createTool(async () => 'later')

      const { result } = await collectGenerator(tool.stream(createMockContext({ name: 'page_number', toolUseId: 'call-2', input: {} })))

      expect(result.content).toEqual([{ type: 'toolResultTextContent', text: 'later' }])
    })

    it('turns generator yields into stream events', async () => {
      const tool = createTool(async function* () {
        yield 'loading'
        yield { saved: 1 }
        return 'done'
      })

      const { items, result } = await collectGenerator(
        tool.stream(createMockContext({ name: 'page_number', toolUseId: 'call-3', input: {} }))
      )

      expect(items).toEqual([
        { type: 'toolStreamEvent', data: 'loading' },
        { type: 'toolStreamEvent', data: { saved: 1 } },
      ])
      expect(result.content).toEqual([{ type: 'toolResultTextContent', text: 'done' }])
    })

    it('passes the tool input and context to the callback', async () => {
      const callback = vi.fn<FunctionToolCallback>(() => 'ok')
      const context = createMockContext({ name: 'page_number', toolUseId: 'call-4', input: { title: '5.2' } }, { bookId: 7 })

      await collectGenerator(createTool(callback).stream(context))

      expect(callback).toHaveBeenCalledWith({ title: '5.2' }, context)
    })

    it('returns thrown errors as error results and logs them', async () => {
      const tool = createTool(() => {
        throw new Error('boom')
      })

      const { result } = await collectGenerator(tool.stream(createMockContext({ name: 'page_number', toolUseId: 'call-5', input: {} })))

      expect(result.status).toBe('error')
      expect(result.content).toEqual([{ type: 'toolResultTextContent', text: 'Error: boom' }])
      expect(result.error).toBeInstanceOf(Error)
      expect(warn).toHaveBeenCalledWith('[tools] page_number failed:', expect.any(Error))
    })

    it('normalizes thrown values that are not errors', async () => {
      const tool = createTool(async () => {
        throw 'plain string'
      })

      const { result } = await collectGenerator(tool.stream(createMockContext({ name: 'page_number', toolUseId: 'call-6', input: {} })))

      expect(result.content).toEqual([{ type: 'toolResultTextContent', text: 'Error: plain string' }])
    })
  })

  describe('invoke', () => {
    it('returns the raw value', async () => {
      expect(await createTool(() => ({ number: '5.2' })).invoke({})).toEqual({ number: '5.2' })
    })

    it('returns the final value of a generator', async () => {
      const tool = createTool(async function* () {
        yield 1
        return 2
      })

      expect(await tool.invoke({})).toBe(2)
    })

    it('builds a context when none is given', async () => {
      const callback = vi.fn<FunctionToolCallback>(() => null)

      await createTool(callback).invoke({ title: 'x' })

      expect(callback).toHaveBeenCalledWith(
        { title: 'x' },
        { toolUse: { name: 'page_number', toolUseId: 'direct-invocation', input: { title: 'x' } }, invocationState: {} }
      )
    })

    it('lets errors propagate', async () => {
      const tool = createTool(() => {
        throw new Error('boom')
      })

      await expect(tool.invoke({})).rejects.toThrow('boom')
    })
  })
})
