import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { ComparedCommit } from './format-commit-line'
import type { Repo } from '../../types/repo'

import { formatCommitLine } from './format-commit-line'
import { requestPage } from './request-page'
import { paginate } from './paginate'

/**
 * Build a changelog from the commits between two refs, one line per commit,
 * in the order the server returns them.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param previous - Base ref of the comparison.
 * @param current - Head ref of the comparison.
 * @param options - Cancellation.
 * @returns Formatted commit lines.
 */
export async function getChangelog(
  context: GitHubClientContext,
  repo: Repo,
  previous: string,
  current: string,
  options: RequestOptions = {},
): Promise<string[]> {
  let path =
    `/repos/${repo.owner}/${repo.name}/compare/` +
    `${encodeURIComponent(previous)}...${encodeURIComponent(current)}`

  let commits = paginate(page =>
    requestPage(context, path, {
      select: data => (data as { commits: ComparedCommit[] }).commits,
      signal: options.signal,
      perPage: 100,
      page,
    }),
  )

  let lines: string[] = []
  for await (let commit of commits) {
    lines.push(formatCommitLine(commit))
  }
  return lines
}
