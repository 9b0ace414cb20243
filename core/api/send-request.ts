import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'

import { GitHubApiError } from '../errors/github-api-error'
import { parseNextPage } from './parse-next-page'

/** Request shaping accepted by `sendRequest` and `makeRequest`. */
export interface RequestParameters extends RequestOptions {
  /** Extra headers; override the defaults. */
  headers?: Record<string, string>

  /** Which base URL the path is appended to. Defaults to `api`. */
  target?: 'upload' | 'api'

  /** Bytes sent as-is. Takes precedence over `json`. */
  rawBody?: Uint8Array

  /** Value serialized as the JSON request body. */
  json?: unknown

  /** HTTP method, `GET` by default. */
  method?: string
}

/** Decoded successful response. */
export interface ApiResponse {
  /** Value of `X-GitHub-Request-Id`, when sent. */
  requestId: undefined | string

  /** Next page cursor from the Link header; 0 when absent. */
  nextPage: number

  /** HTTP status code. */
  status: number

  /** Parsed JSON body, or null for an empty body. */
  data: unknown
}

/**
 * Perform a single HTTP exchange with auth headers, without the quota guard.
 *
 * @param context - Client context.
 * @param path - Path beginning with '/', appended to the target base URL.
 * @param parameters - Request shaping and cancellation.
 * @returns Parsed response.
 * @throws {GitHubApiError} When the response status is not 2xx.
 */
export async function sendRequest(
  context: GitHubClientContext,
  path: string,
  parameters: RequestParameters = {},
): Promise<ApiResponse> {
  let headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': '2022-11-28',
    'User-Agent': 'release-courier',
  }

  let body: Uint8Array | undefined | string
  if (parameters.rawBody) {
    body = parameters.rawBody
  } else if (parameters.json !== undefined) {
    body = JSON.stringify(parameters.json)
    headers['Content-Type'] = 'application/json'
  }

  Object.assign(headers, parameters.headers)
  if (context.token) {
    headers['Authorization'] = `Bearer ${context.token}`
  }

  let base =
    parameters.target === 'upload' ? context.urls.upload : context.urls.api
  let response = await context.transport(`${base}${path}`, {
    method: parameters.method ?? 'GET',
    signal: parameters.signal,
    headers,
    body,
  })

  let requestId = response.headers.get('x-github-request-id') ?? undefined
  let text = await response.text()

  if (!response.ok) {
    let message = `GitHub API error: ${response.status} ${response.statusText}`
    let detail = readErrorMessage(text)
    if (detail) {
      message += ` (${detail})`
    }
    throw new GitHubApiError(response.status, message, requestId)
  }

  return {
    data: text === '' ? null : (JSON.parse(text) as unknown),
    nextPage: parseNextPage(response.headers.get('link')),
    status: response.status,
    requestId,
  }
}

function readErrorMessage(text: string): undefined | string {
  try {
    let parsed: unknown = JSON.parse(text)
    if (
      parsed &&
      typeof parsed === 'object' &&
      'message' in parsed &&
      typeof parsed.message === 'string'
    ) {
      return parsed.message
    }
    return undefined
  } catch {
    return text.trim() === '' ? undefined : text.trim().slice(0, 200)
  }
}
