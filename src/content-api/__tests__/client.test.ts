import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { ContentApiClient } from '../client.js'
import { NEW_PAGE_ID } from '../../types/book.js'

const BASE_URL = 'https://content.test/napi'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

describe('ContentApiClient', () => {
  const fetchFn = vi.fn<typeof fetch>()
  let client: ContentApiClient

  beforeEach(() => {
    fetchFn.mockReset()
    client = new ContentApiClient({ baseUrl: `${BASE_URL}/`, token: 'test-secret', fetchFn })
  })

  describe('authentication', () => {
    it('sends the token header', async () => {
      fetchFn.mockResolvedValueOnce(jsonResponse([]))

      await client.listBooks()

      expect(fetchFn).toHaveBeenCalledWith(`${BASE_URL}/books/`, {
        method: 'GET',
        headers: { Authorization: 'Token test-secret' },
      })
    })

    it('fails every call without a token and sends nothing', async () => {
      const anonymous = new ContentApiClient({ baseUrl: BASE_URL, fetchFn })

      const result = await anonymous.getPage(1)

      expect(result).toEqual({
        ok: false,
        error: { kind: 'missingToken', message: 'No API token is configured. Set CONTENT_API_TOKEN.' },
      })
      expect(fetchFn).not.toHaveBeenCalled()
    })
  })

  describe('listBooks', () => {
    it('maps summaries', async () => {
      fetchFn.mockResolvedValueOnce(
        jsonResponse([
          { id: 1, subject: 'First', summary: 'One' },
          { id: 2, subject: 'Second', summary: null, extra: true },
        ])
      )

      expect(await client.listBooks()).toEqual({
        ok: true,
        value: [
          { id: 1, title: 'First', summary: 'One' },
          { id: 2, title: 'Second', summary: '' },
        ],
      })
    })
  })

  describe('fetchBook', () => {
    it('maps the page forest to the domain model', async () => {
      fetchFn.mockResolvedValueOnce(
        jsonResponse({
          id: 7,
          subject: 'Guide',
          summary: 'About things',
          pages: [
            {
              id: 10,
              subject: '1. Start',
              content: '# 1. Start',
              parent_id: 0,
              depth: 0,
              seq: 0,
              open_yn: 'Y',
              children: [{ id: 11, subject: '1.1 Detail', content: null, open_yn: 'N' }],
            },
            { id: 20, subject: '2. Next', content: '' },
          ],
        })
      )

      const result = await client.fetchBook(7)

      expect(fetchFn.mock.calls[0]?.[0]).toBe(`${BASE_URL}/books/7/`)
      expect(result).toEqual({
        ok: true,
        value: {
          id: 7,
          title: 'Guide',
          summary: 'About things',
          pages: [
            {
              id: 10,
              title: '1. Start',
              body: '# 1. Start',
              parentId: null,
              depth: 0,
              seq: 0,
              isOpen: true,
              children: [
                { id: 11, title: '1.1 Detail', body: '', parentId: 10, depth: 1, seq: 0, isOpen: false, children: [] },
              ],
            },
            { id: 20, title: '2. Next', body: '', parentId: null, depth: 0, seq: 1, isOpen: true, children: [] },
          ],
        },
      })
    })

    it('reports a response that does not match the book schema', async () => {
      fetchFn.mockResolvedValueOnce(jsonResponse({ id: 'seven' }))

      const result = await client.fetchBook(7)

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.kind).toBe('invalidResponse')
        expect(result.error.message).toMatch(/^Unexpected response from GET \/books\/7\/: /)
      }
    })
  })

  describe('getPage', () => {
    it('keeps the parent id the service reports', async () => {
      fetchFn.mockResolvedValueOnce(jsonResponse({ id: 5, subject: 'Five', content: 'x', parent_id: 3, depth: 2, seq: 4 }))

      expect(await client.getPage(5)).toEqual({
        ok: true,
        value: { id: 5, title: 'Five', body: 'x', parentId: 3, depth: 2, seq: 4, isOpen: true, children: [] },
      })
    })
  })

  describe('error mapping', () => {
    it.each([
      [404, { kind: 'notFound', message: 'The requested resource was not found', status: 404 }],
      [422, { kind: 'unprocessable', message: 'The service rejected the request data', status: 422 }],
      [500, { kind: 'http', message: 'HTTP Error 500: Internal Server Error', status: 500 }],
    ])('maps status %i', async (status, error) => {
      fetchFn.mockResolvedValueOnce(new Response('{}', { status, statusText: status === 500 ? 'Internal Server Error' : '' }))

      expect(await client.getPage(1)).toEqual({ ok: false, error })
    })

    it('maps a rejected fetch to a network error', async () => {
      fetchFn.mockRejectedValueOnce(new Error('socket hang up'))

      expect(await client.getBlogProfile()).toEqual({
        ok: false,
        error: { kind: 'network', message: 'Request failed: socket hang up' },
      })
    })

    it('maps a body that is not JSON', async () => {
      fetchFn.mockResolvedValueOnce(new Response('<html>', { status: 200 }))

      expect(await client.getBlogProfile()).toEqual({
        ok: false,
        error: { kind: 'invalidResponse', message: 'Response from GET /blog/profile/ is not JSON', status: 200 },
      })
    })

    it('treats an empty body as null', async () => {
      fetchFn.mockResolvedValueOnce(new Response('', { status: 200 }))

      expect(await client.getBlogProfile()).toEqual({ ok: true, value: null })
    })
  })

  describe('savePage', () => {
    it('creates a page with depth and sequence forced to zero', async () => {
      fetchFn.mockResolvedValueOnce(jsonResponse({ id: 99 }))

      const result = await client.savePage(NEW_PAGE_ID, {
        bookId: 7,
        title: '5.3 New',
        body: 'Text',
        parentId: null,
        isOpen: true,
      })

      expect(result).toEqual({ ok: true, value: { id: 99 } })
      const [url, init] = fetchFn.mock.calls[0] ?? []
      expect(url).toBe(`${BASE_URL}/pages/-1/`)
      expect(init?.method).toBe('PUT')
      expect(init?.headers).toEqual({ Authorization: 'Token test-secret', 'Content-Type': 'application/json' })
      expect(JSON.parse(String(init?.body))).toEqual({
        id: 0,
        subject: '5.3 New',
        content: 'Text',
        parent_id: 0,
        depth: 0,
        seq: 0,
        book_id: 7,
        open_yn: 'Y',
      })
    })

    it('updates an existing page', async () => {
      fetchFn.mockResolvedValueOnce(jsonResponse({ id: 12 }))

      await client.savePage(12, { title: 'T', body: 'B', parentId: 4, isOpen: false })

      const [url, init] = fetchFn.mock.calls[0] ?? []
      expect(url).toBe(`${BASE_URL}/pages/12/`)
      expect(JSON.parse(String(init?.body))).toEqual({
        id: 12,
        subject: 'T',
        content: 'B',
        parent_id: 4,
        depth: 0,
        seq: 0,
        book_id: 0,
        open_yn: 'N',
      })
    })
  })

  describe('blog', () => {
    it('lists posts by result page', async () => {
      fetchFn.mockResolvedValueOnce(jsonResponse({ posts: [] }))

      await client.listBlogPosts(3)

      expect(fetchFn.mock.calls[0]?.[0]).toBe(`${BASE_URL}/blog/list/3`)
    })

    it('gets a post without a trailing slash', async () => {
      fetchFn.mockResolvedValueOnce(jsonResponse({ id: 8 }))

      expect(await client.getBlogPost(8)).toEqual({ ok: true, value: { id: 8 } })
      expect(fetchFn.mock.calls[0]?.[0]).toBe(`${BASE_URL}/blog/8`)
    })

    it('creates and updates posts with wire field names', async () => {
      fetchFn.mockImplementation(async () => jsonResponse({ ok: 1 }))
      const post = { title: 'Hello', content: 'Body', isPublic: false, tags: 'a,b' }

      await client.createBlogPost(post)
      await client.updateBlogPost(8, post)

      const [createUrl, createInit] = fetchFn.mock.calls[0] ?? []
      const [updateUrl, updateInit] = fetchFn.mock.calls[1] ?? []
      expect([createUrl, createInit?.method]).toEqual([`${BASE_URL}/blog/create/`, 'POST'])
      expect([updateUrl, updateInit?.method]).toEqual([`${BASE_URL}/blog/8/`, 'PUT'])
      expect(JSON.parse(String(createInit?.body))).toEqual({
        title: 'Hello',
        content: 'Body',
        is_public: false,
        tags: 'a,b',
      })
    })
  })

  describe('uploadImage', () => {
    let dir: string

    beforeEach(async () => {
      dir = await fs.mkdtemp(join(tmpdir(), 'booksmith-upload-'))
    })

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true })
    })

    it('posts the file as multipart form data', async () => {
      const filePath = join(dir, 'diagram.png')
      await fs.writeFile(filePath, 'not really a png')
      fetchFn.mockResolvedValueOnce(jsonResponse({ url: '/media/diagram.png' }))

      const result = await client.uploadImage('page', 12, filePath)

      expect(result).toEqual({ ok: true, value: { url: '/media/diagram.png' } })
      const [url, init] = fetchFn.mock.calls[0] ?? []
      expect(url).toBe(`${BASE_URL}/images/upload/`)
      expect(init?.headers).toEqual({ Authorization: 'Token test-secret' })
      const form = init?.body
      expect(form).toBeInstanceOf(FormData)
      if (form instanceof FormData) {
        expect(form.get('page_id')).toBe('12')
        const file = form.get('file')
        expect(file).toBeInstanceOf(Blob)
        if (file instanceof Blob) {
          expect(await file.text()).toBe('not really a png')
        }
      }
    })

    it('uses the blog endpoint for blog images', async () => {
      const filePath = join(dir, 'photo.jpg')
      await fs.writeFile(filePath, 'jpg')
      fetchFn.mockResolvedValueOnce(jsonResponse({}))

      await client.uploadImage('blog', 8, filePath)

      const [url, init] = fetchFn.mock.calls[0] ?? []
      expect(url).toBe(`${BASE_URL}/blog/images/upload/`)
      const form = init?.body
      expect(form instanceof FormData ? form.get('blog_id') : undefined).toBe('8')
    })

    it('reports a missing file without calling the service', async () => {
      const filePath = join(dir, 'missing.png')

      expect(await client.uploadImage('page', 12, filePath)).toEqual({
        ok: false,
        error: { kind: 'fileNotFound', message: `File not found: ${filePath}` },
      })
      expect(fetchFn).not.toHaveBeenCalled()
    })
  })
})
