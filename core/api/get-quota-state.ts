import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { QuotaState } from '../../types/quota-state'

import { sendRequest } from './send-request'

/**
 * Read the current core API quota. Never guarded itself.
 *
 * @param context - Client context.
 * @param options - Cancellation.
 * @returns Remaining calls and reset time.
 */
export async function getQuotaState(
  context: GitHubClientContext,
  options: RequestOptions = {},
): Promise<QuotaState> {
  let response = await sendRequest(context, '/rate_limit', options)
  let { core } = (
    response.data as components['schemas']['rate-limit-overview']
  ).resources

  return {
    resetAt: new Date(core.reset * 1000),
    remaining: core.remaining,
  }
}
