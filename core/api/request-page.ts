import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { Page } from '../../types/page'

import { makeRequest } from './make-request'

/**
 * Fetch one page of a listing endpoint.
 *
 * @param context - Client context.
 * @param path - Endpoint path, with or without a query string.
 * @param parameters - Page selection and item extraction.
 * @param parameters.page - Page cursor.
 * @param parameters.perPage - Page size.
 * @param parameters.select - Picks the items out of the response body.
 * @param parameters.signal - Cancellation.
 * @returns Items and the next cursor.
 */
export async function requestPage<T>(
  context: GitHubClientContext,
  path: string,
  parameters: {
    select(data: unknown): T[]
    perPage: number
    page: number
  } & RequestOptions,
): Promise<Page<T>> {
  let separator = path.includes('?') ? '&' : '?'
  let response = await makeRequest(
    context,
    `${path}${separator}per_page=${parameters.perPage}&page=${parameters.page}`,
    { signal: parameters.signal },
  )

  return {
    items: parameters.select(response.data),
    nextPage: response.nextPage,
  }
}
