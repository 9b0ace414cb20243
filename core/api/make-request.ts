import type { GitHubClientContext } from '../../types/github-client-context'
import type { ApiResponse, RequestParameters } from './send-request'

import { waitForQuota } from './wait-for-quota'
import { sendRequest } from './send-request'

/**
 * Perform a guarded request: waits for enough quota, then sends.
 *
 * @param context - Client context with transport, token and quota settings.
 * @param path - API path beginning with '/'.
 * @param parameters - Request shaping and cancellation.
 * @returns Parsed response.
 */
export async function makeRequest(
  context: GitHubClientContext,
  path: string,
  parameters: RequestParameters = {},
): Promise<ApiResponse> {
  await waitForQuota(context, { signal: parameters.signal })
  return sendRequest(context, path, parameters)
}
