import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { PullRequestRequest } from '../../types/pull-request-request'
import type { RequestOptions } from '../../types/request-options'

import { getPullRequestTemplate } from './get-pull-request-template'
import { formatReference } from '../repo/format-reference'
import { describeError } from '../errors/describe-error'
import { firstNonEmpty } from '../repo/first-non-empty'
import { getDefaultBranch } from './get-default-branch'
import { isUnprocessable } from '../errors/has-status'
import { makeRequest } from './make-request'

/** Appended to every pull request body. */
export const pullRequestFooter = '###### Automated with release-courier'

/**
 * Open a pull request from `head` into `base`.
 *
 * The base branch defaults to the repository's default branch. A validation
 * failure (for example, the pull request already exists) is logged and
 * treated as success.
 *
 * @param context - Client context.
 * @param request - Base, head, title and draft flag.
 * @param options - Cancellation.
 */
export async function openPullRequest(
  context: GitHubClientContext,
  request: PullRequestRequest,
  options: RequestOptions = {},
): Promise<void> {
  let { draft, title, head } = request
  let base = { ...request.base }
  if (!base.branch) {
    base.branch = await getDefaultBranch(context, base, options)
  }

  let template = await getPullRequestTemplate(context, base, options)
  if (template) {
    context.logger.info('got a pr template')
  }

  let fields = {
    base: formatReference(base, head),
    head: formatReference(head, base),
    draft,
  }
  context.logger.info('opening pull request', fields)

  try {
    let response = await makeRequest(
      context,
      `/repos/${firstNonEmpty(base.owner, head.owner)}/${firstNonEmpty(base.name, head.name)}/pulls`,
      {
        json: {
          body: [template, pullRequestFooter].join('\n'),
          base: base.branch,
          head: fields.head,
          title,
          draft,
        },
        signal: options.signal,
        method: 'POST',
      },
    )
    let pullRequest = response.data as components['schemas']['pull-request']
    context.logger.info('pull request created', {
      ...fields,
      url: pullRequest.html_url,
    })
  } catch (error) {
    if (isUnprocessable(error)) {
      context.logger.warn('pull request validation failed', {
        ...fields,
        error: describeError(error),
      })
      return
    }
    throw new Error('could not create pull request', { cause: error })
  }
}
