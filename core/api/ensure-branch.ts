import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { Repo } from '../../types/repo'

import { formatRepository } from '../repo/format-repository'
import { isNotFound } from '../errors/has-status'
import { encodePath } from '../repo/encode-path'
import { makeRequest } from './make-request'

/**
 * Make sure a branch exists, creating it at the current tip of another
 * branch when it does not.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param branch - Branch that must exist.
 * @param from - Branch whose tip a new branch points at.
 * @param options - Cancellation.
 * @returns True when the branch was created.
 */
export async function ensureBranch(
  context: GitHubClientContext,
  repo: Repo,
  branch: string,
  from: string,
  options: RequestOptions = {},
): Promise<boolean> {
  let prefix = `/repos/${repo.owner}/${repo.name}`

  try {
    await makeRequest(
      context,
      `${prefix}/branches/${encodeURIComponent(branch)}`,
      options,
    )
    return false
  } catch (error) {
    if (!isNotFound(error)) {
      throw new Error(`could not get branch "${branch}"`, { cause: error })
    }
  }

  let sourceReference = `refs/heads/${from}`
  let sha: string
  try {
    let response = await makeRequest(
      context,
      `${prefix}/git/ref/heads/${encodePath(from)}`,
      options,
    )
    sha = (response.data as components['schemas']['git-ref']).object.sha
  } catch (error) {
    throw new Error(`could not get ref "${sourceReference}"`, { cause: error })
  }

  let reference = `refs/heads/${branch}`
  try {
    await makeRequest(context, `${prefix}/git/refs`, {
      json: { ref: reference, sha },
      signal: options.signal,
      method: 'POST',
    })
  } catch (error) {
    throw new Error(`could not create ref "${reference}" from "${sha}"`, {
      cause: error,
    })
  }

  context.logger.info('created branch', {
    repository: formatRepository(repo),
    from,
    branch,
    sha,
  })
  return true
}
