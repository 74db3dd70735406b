export { ContentApiClient, DEFAULT_CONTENT_API_URL } from './client.js'
export type { ApiError, ApiErrorKind, ApiResult, ContentApiClientConfig, ImageTarget } from './client.js'
export { apiErrorToJson, toToolOutput } from './output.js'
