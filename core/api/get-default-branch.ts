import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { Repo } from '../../types/repo'

import { formatRepository } from '../repo/format-repository'
import { GitHubApiError } from '../errors/github-api-error'
import { describeError } from '../errors/describe-error'
import { makeRequest } from './make-request'

/**
 * Fetch the default branch of a repository.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param options - Cancellation.
 * @returns Default branch name.
 */
export async function getDefaultBranch(
  context: GitHubClientContext,
  repo: Repo,
  options: RequestOptions = {},
): Promise<string> {
  try {
    let response = await makeRequest(
      context,
      `/repos/${repo.owner}/${repo.name}`,
      options,
    )
    return (response.data as components['schemas']['full-repository'])
      .default_branch
  } catch (error) {
    context.logger.warn('error checking for default branch', {
      statusCode: error instanceof GitHubApiError ? error.status : undefined,
      projectID: formatRepository(repo),
      error: describeError(error),
    })
    throw new Error(
      `could not get default branch of ${formatRepository(repo)}`,
      { cause: error },
    )
  }
}
