import { describe, it, expect } from 'vitest'
import { deepCopy } from '../json.js'

describe('deepCopy', () => {
  describe('primitive values', () => {
    it.each([['hello'], [42], [true], [null]])('copies %j', (value) => {
      expect(deepCopy(value)).toBe(value)
    })
  })

  describe('object values', () => {
    it('creates a deep copy of objects', () => {
      const original = { page: { title: '5.2 Setup' } }
      const copy = deepCopy(original)

      expect(copy).toEqual(original)
      expect(copy).not.toBe(original)

      original.page.title = 'changed'
      expect(copy).toEqual({ page: { title: '5.2 Setup' } })
    })

    it('drops undefined fields', () => {
      const page = { id: 3, parentId: undefined, title: 'Intro' }

      expect(deepCopy(page)).toEqual({ id: 3, title: 'Intro' })
      expect(deepCopy(page)).not.toHaveProperty('parentId')
    })

    it('drops function fields', () => {
      const withFunction = { id: 3, render: (): string => 'x' }

      expect(deepCopy(withFunction)).toEqual({ id: 3 })
    })
  })

  describe('array values', () => {
    it('copies nested page lists', () => {
      const original = [{ id: 1, children: [{ id: 2, children: [] }] }]
      const copy = deepCopy(original)

      expect(copy).toEqual(original)
      expect(copy).not.toBe(original)
    })
  })

  describe('unserializable values', () => {
    it('throws for bigint values', () => {
      expect(() => deepCopy({ count: 10n })).toThrow(/^Unable to serialize tool result: /)
    })

    it('throws for circular structures', () => {
      const node: { id: number; self?: unknown } = { id: 1 }
      node.self = node

      expect(() => deepCopy(node)).toThrow(/^Unable to serialize tool result: /)
    })
  })
})
