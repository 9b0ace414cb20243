import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { Repo } from '../../types/repo'

import { isNotFound } from '../errors/has-status'
import { encodePath } from '../repo/encode-path'
import { makeRequest } from './make-request'

/**
 * Fetch the blob SHA of a file on a branch.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param path - File path.
 * @param branch - Ref to read from.
 * @param options - Cancellation.
 * @returns Current SHA, or undefined when the file does not exist.
 */
export async function getFileSha(
  context: GitHubClientContext,
  repo: Repo,
  path: string,
  branch: string,
  options: RequestOptions = {},
): Promise<undefined | string> {
  try {
    let response = await makeRequest(
      context,
      `/repos/${repo.owner}/${repo.name}/contents/${encodePath(path)}?ref=${encodeURIComponent(branch)}`,
      options,
    )
    let file = response.data as { sha?: string }
    return file.sha
  } catch (error) {
    if (isNotFound(error)) {
      return undefined
    }
    throw new Error(`could not get "${path}"`, { cause: error })
  }
}
