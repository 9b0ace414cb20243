import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { Repo } from '../../types/repo'

import { isNotFound } from '../errors/has-status'
import { makeRequest } from './make-request'

/**
 * Look up a published release by tag.
 *
 * Only a 404 means "absent"; any other failure is rethrown so that a
 * transient error cannot lead to a duplicate create.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param tag - Tag name.
 * @param options - Cancellation.
 * @returns The release, or null when none exists for the tag.
 */
export async function getReleaseByTag(
  context: GitHubClientContext,
  repo: Repo,
  tag: string,
  options: RequestOptions = {},
): Promise<components['schemas']['release'] | null> {
  try {
    let response = await makeRequest(
      context,
      `/repos/${repo.owner}/${repo.name}/releases/tags/${encodeURIComponent(tag)}`,
      options,
    )
    return response.data as components['schemas']['release']
  } catch (error) {
    if (isNotFound(error)) {
      return null
    }
    throw error
  }
}
