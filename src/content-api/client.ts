import { promises as fs } from 'fs'
import { basename } from 'path'
import type { z } from 'zod'
import type { Book, BookSummary, Page, PageFields } from '../types/book.js'
import type { BlogPostFields } from '../types/blog.js'
import type { JSONValue } from '../types/json.js'
import { logger } from '../logging/logger.js'
import { normalizeError } from '../errors.js'
import { formatZodError } from '../utils/zod.js'
import {
  toBook,
  toBookSummary,
  toPage,
  toWireBlogPost,
  toWirePageFields,
  wireBookListSchema,
  wireBookSchema,
  wirePageSchema,
} from './schemas.js'

/**
 * Base URL of the hosted content API.
 */
export const DEFAULT_CONTENT_API_URL = 'https://wikidocs.net/napi'

/**
 * Category of a failed API call.
 */
export type ApiErrorKind =
  | 'missingToken'
  | 'notFound'
  | 'unprocessable'
  | 'http'
  | 'network'
  | 'invalidResponse'
  | 'fileNotFound'

/**
 * A failed API call.
 */
export interface ApiError {
  kind: ApiErrorKind
  message: string
  /** HTTP status, when the service answered. */
  status?: number
}

/**
 * Outcome of an API call. The client reports failures here and never throws.
 */
export type ApiResult<T> = { ok: true; value: T } | { ok: false; error: ApiError }

/**
 * Which upload endpoint an image belongs to.
 */
export type ImageTarget = 'page' | 'blog'

/**
 * Configuration for {@link ContentApiClient}.
 */
export interface ContentApiClientConfig {
  /** Defaults to {@link DEFAULT_CONTENT_API_URL}. */
  baseUrl?: string

  /** API token. Every call fails with `missingToken` without one. */
  token?: string

  /** Fetch implementation. Defaults to the global fetch. */
  fetchFn?: typeof fetch
}

type HttpMethod = 'GET' | 'POST' | 'PUT'

const UPLOAD_ENDPOINTS: Record<ImageTarget, { path: string; field: string }> = {
  page: { path: '/images/upload/', field: 'page_id' },
  blog: { path: '/blog/images/upload/', field: 'blog_id' },
}

function failure(kind: ApiErrorKind, message: string, status?: number): { ok: false; error: ApiError } {
  return { ok: false, error: status === undefined ? { kind, message } : { kind, message, status } }
}

function isFileNotFoundError(error: unknown): boolean {
  return error !== null && typeof error === 'object' && 'code' in error && error.code === 'ENOENT'
}

/**
 * Client for the book and blog content API.
 *
 * Book and page responses are validated and mapped to the domain model. Blog
 * responses are returned as the service sends them.
 *
 * @example
 * ```typescript
 * const client = new ContentApiClient({ token: process.env.CONTENT_API_TOKEN })
 * const result = await client.fetchBook(42)
 * if (result.ok) {
 *   console.log(result.value.pages.length)
 * }
 * ```
 */
export class ContentApiClient {
  private readonly _baseUrl: string
  private readonly _token: string | undefined
  private readonly _fetch: typeof fetch

  constructor(config: ContentApiClientConfig = {}) {
    this._baseUrl = (config.baseUrl ?? DEFAULT_CONTENT_API_URL).replace(/\/+$/, '')
    this._token = config.token
    this._fetch = config.fetchFn ?? ((input, init) => globalThis.fetch(input, init))
  }

  /**
   * Lists the books written by the token's owner.
   */
  async listBooks(): Promise<ApiResult<BookSummary[]>> {
    const result = await this._requestParsed('GET', '/books/', wireBookListSchema)
    return result.ok ? { ok: true, value: result.value.map(toBookSummary) } : result
  }

  /**
   * Fetches a book with its whole page forest.
   */
  async fetchBook(bookId: number): Promise<ApiResult<Book>> {
    const result = await this._requestParsed('GET', `/books/${bookId}/`, wireBookSchema)
    return result.ok ? { ok: true, value: toBook(result.value) } : result
  }

  async getPage(pageId: number): Promise<ApiResult<Page>> {
    const result = await this._requestParsed('GET', `/pages/${pageId}/`, wirePageSchema)
    return result.ok ? { ok: true, value: toPage(result.value) } : result
  }

  /**
   * Creates or updates a page. Pass {@link NEW_PAGE_ID} to create one.
   *
   * The service's reply is returned unchanged.
   */
  async savePage(pageId: number, fields: PageFields): Promise<ApiResult<JSONValue>> {
    return this._request('PUT', `/pages/${pageId}/`, toWirePageFields(pageId, fields))
  }

  /**
   * Uploads an image file and attaches it to a page or a blog post.
   */
  async uploadImage(target: ImageTarget, targetId: number, filePath: string): Promise<ApiResult<JSONValue>> {
    if (this._token === undefined) {
      return this._missingToken()
    }

    let data: Buffer
    try {
      data = await fs.readFile(filePath)
    } catch (error: unknown) {
      if (isFileNotFoundError(error)) {
        return failure('fileNotFound', `File not found: ${filePath}`)
      }
      return failure('fileNotFound', `Unable to read ${filePath}: ${normalizeError(error).message}`)
    }

    const { path, field } = UPLOAD_ENDPOINTS[target]
    const form = new FormData()
    form.append('file', new Blob([data]), basename(filePath))
    form.append(field, String(targetId))

    return this._request('POST', path, form)
  }

  async getBlogProfile(): Promise<ApiResult<JSONValue>> {
    return this._request('GET', '/blog/profile/')
  }

  /**
   * Lists blog posts one page of results at a time.
   *
   * @param page - 1-based result page
   */
  async listBlogPosts(page = 1): Promise<ApiResult<JSONValue>> {
    return this._request('GET', `/blog/list/${page}`)
  }

  async getBlogPost(blogId: number): Promise<ApiResult<JSONValue>> {
    return this._request('GET', `/blog/${blogId}`)
  }

  async createBlogPost(post: BlogPostFields): Promise<ApiResult<JSONValue>> {
    return this._request('POST', '/blog/create/', toWireBlogPost(post))
  }

  async updateBlogPost(blogId: number, post: BlogPostFields): Promise<ApiResult<JSONValue>> {
    return this._request('PUT', `/blog/${blogId}/`, toWireBlogPost(post))
  }

  private async _requestParsed<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T>
  ): Promise<ApiResult<T>> {
    const result = await this._request(method, path)
    if (!result.ok) {
      return result
    }

    const parsed = schema.safeParse(result.value)
    if (!parsed.success) {
      return failure('invalidResponse', `Unexpected response from ${method} ${path}: ${formatZodError(parsed.error)}`)
    }
    return { ok: true, value: parsed.data }
  }

  private async _request(method: HttpMethod, path: string, body?: JSONValue | FormData): Promise<ApiResult<JSONValue>> {
    if (this._token === undefined) {
      return this._missingToken()
    }

    const headers: Record<string, string> = { Authorization: `Token ${this._token}` }
    const init: RequestInit = { method, headers }
    if (body instanceof FormData) {
      init.body = body
    } else if (body !== undefined) {
      headers['Content-Type'] = 'application/json'
      init.body = JSON.stringify(body)
    }

    let response: Response
    try {
      logger.debug(`[content-api] ${method} ${path}`)
      response = await this._fetch(`${this._baseUrl}${path}`, init)
    } catch (error: unknown) {
      return failure('network', `Request failed: ${normalizeError(error).message}`)
    }

    if (!response.ok) {
      logger.warn(`[content-api] ${method} ${path} returned ${response.status}`)
      if (response.status === 404) {
        return failure('notFound', 'The requested resource was not found', 404)
      }
      if (response.status === 422) {
        return failure('unprocessable', 'The service rejected the request data', 422)
      }
      return failure('http', `HTTP Error ${response.status}: ${response.statusText}`, response.status)
    }

    let text: string
    try {
      text = await response.text()
    } catch (error: unknown) {
      return failure('network', `Request failed: ${normalizeError(error).message}`)
    }

    if (text.trim() === '') {
      return { ok: true, value: null }
    }
    try {
      return { ok: true, value: JSON.parse(text) as JSONValue }
    } catch {
      return failure('invalidResponse', `Response from ${method} ${path} is not JSON`, response.status)
    }
  }

  private _missingToken(): { ok: false; error: ApiError } {
    return failure('missingToken', 'No API token is configured. Set CONTENT_API_TOKEN.')
  }
}
