import type { JSONValue } from '../types/json.js'
import { deepCopy } from '../types/json.js'
import type { ApiError, ApiResult } from './client.js'

/**
 * JSON form of an API failure as tools report it.
 */
export function apiErrorToJson(error: ApiError): { [key: string]: JSONValue } {
  return error.status === undefined
    ? { error: error.kind, message: error.message }
    : { error: error.kind, message: error.message, status: error.status }
}

/**
 * Turns an API result into tool output: the mapped value on success, the
 * error object on failure.
 *
 * @param map - Shapes the successful value; defaults to a plain JSON copy
 */
export function toToolOutput<T>(result: ApiResult<T>, map: (value: T) => JSONValue = deepCopy): JSONValue {
  return result.ok ? map(result.value) : apiErrorToJson(result.error)
}
