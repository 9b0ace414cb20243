import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { Repo } from '../../types/repo'

import { describeError } from '../errors/describe-error'
import { makeRequest } from './make-request'

/**
 * Fetch `.github/PULL_REQUEST_TEMPLATE.md` from the repository's branch.
 * Any failure other than cancellation counts as "no template".
 *
 * @param context - Client context.
 * @param repo - Repository; `branch` selects the ref.
 * @param options - Cancellation.
 * @returns Template text, or an empty string.
 */
export async function getPullRequestTemplate(
  context: GitHubClientContext,
  repo: Repo,
  options: RequestOptions = {},
): Promise<string> {
  let query = repo.branch ? `?ref=${encodeURIComponent(repo.branch)}` : ''
  try {
    let response = await makeRequest(
      context,
      `/repos/${repo.owner}/${repo.name}/contents/.github/PULL_REQUEST_TEMPLATE.md${query}`,
      options,
    )
    let file = response.data as components['schemas']['content-file']
    return file.encoding === 'base64' ?
        Buffer.from(file.content, 'base64').toString('utf8')
      : file.content
  } catch (error) {
    if (options.signal?.aborted) {
      throw error
    }
    context.logger.debug('no pull request template found...', {
      error: describeError(error),
    })
    return ''
  }
}
