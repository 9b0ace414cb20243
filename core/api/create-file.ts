import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { FileCommit } from '../../types/file-commit'

import { formatRepository } from '../repo/format-repository'
import { getDefaultBranch } from './get-default-branch'
import { encodePath } from '../repo/encode-path'
import { ensureBranch } from './ensure-branch'
import { makeRequest } from './make-request'
import { getFileSha } from './get-file-sha'

/**
 * Commit one file to a branch, creating the branch from the default branch
 * when it is missing. An existing file is updated conditionally on its
 * current SHA; a missing one is created.
 *
 * @param context - Client context.
 * @param commit - File, content, message, committer and target.
 * @param options - Cancellation.
 */
export async function createFile(
  context: GitHubClientContext,
  commit: FileCommit,
  options: RequestOptions = {},
): Promise<void> {
  let { content, message, author, repo, path } = commit

  let defaultBranch = await getDefaultBranch(context, repo, options)
  let branch = repo.branch || defaultBranch

  context.logger.info('pushing', {
    repository: formatRepository(repo),
    file: path,
    branch,
  })

  if (branch !== defaultBranch) {
    await ensureBranch(context, repo, branch, defaultBranch, options)
  }

  let sha = await getFileSha(context, repo, path, branch, options)

  try {
    await makeRequest(
      context,
      `/repos/${repo.owner}/${repo.name}/contents/${encodePath(path)}`,
      {
        json: {
          content: Buffer.from(content).toString('base64'),
          committer: { email: author.email, name: author.name },
          ...(sha ? { sha } : {}),
          message,
          branch,
        },
        signal: options.signal,
        method: 'PUT',
      },
    )
  } catch (error) {
    throw new Error(`could not update "${path}"`, { cause: error })
  }
}
