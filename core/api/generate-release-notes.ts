import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { Repo } from '../../types/repo'

import { makeRequest } from './make-request'

/**
 * Ask the server to generate release notes between two tags.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param previous - Previous tag; empty lets the server pick one.
 * @param current - Tag being released.
 * @param options - Cancellation.
 * @returns Markdown body of the generated notes.
 */
export async function generateReleaseNotes(
  context: GitHubClientContext,
  repo: Repo,
  previous: string,
  current: string,
  options: RequestOptions = {},
): Promise<string> {
  let response = await makeRequest(
    context,
    `/repos/${repo.owner}/${repo.name}/releases/generate-notes`,
    {
      json: {
        ...(previous ? { previous_tag_name: previous } : {}),
        tag_name: current,
      },
      signal: options.signal,
      method: 'POST',
    },
  )
  return (response.data as components['schemas']['release-notes-content'])
    .body
}
