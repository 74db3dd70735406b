import { describe, it, expect } from 'vitest'
import * as Booksmith from '../index.js'

describe('index', () => {
  describe('when importing from main entry point', () => {
    it('exports error classes', () => {
      expect(Booksmith.ConfigurationError).toBeDefined()
      expect(Booksmith.CacheError).toBeDefined()
    })

    it('exports the renumbering engine', () => {
      expect(Booksmith.getPageNumber('5.2 Setup')).toBe('5.2')
      expect(Booksmith.incrementLast('5.2', 1)).toBe('5.3')
    })

    it('can instantiate ContentApiClient', () => {
      const client = new Booksmith.ContentApiClient({ token: 'test-secret' })
      expect(client).toBeInstanceOf(Booksmith.ContentApiClient)
    })

    it('exports all required types', () => {
      // This test ensures all type exports compile correctly
      // If any exports are missing, TypeScript will error
      const _typeCheck: {
        configError: typeof Booksmith.ConfigurationError
        client: typeof Booksmith.ContentApiClient
        cache: typeof Booksmith.FileBookCache
        registry: typeof Booksmith.ToolRegistry
        newPageId: number
      } = {
        configError: Booksmith.ConfigurationError,
        client: Booksmith.ContentApiClient,
        cache: Booksmith.FileBookCache,
        registry: Booksmith.ToolRegistry,
        newPageId: Booksmith.NEW_PAGE_ID,
      }
      expect(_typeCheck).toBeDefined()
    })
  })
})
