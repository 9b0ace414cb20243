import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { Repo } from '../../types/repo'

import { requestPage } from './request-page'
import { paginate } from './paginate'

type Milestone = components['schemas']['milestone']

/**
 * Find a milestone by exact title. There is no lookup by title, so the
 * listing is walked until the first match.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param title - Title to match.
 * @param options - Cancellation.
 * @returns The milestone, or null when no page contains it.
 */
export async function findMilestoneByTitle(
  context: GitHubClientContext,
  repo: Repo,
  title: string,
  options: RequestOptions = {},
): Promise<Milestone | null> {
  let milestones = paginate(page =>
    requestPage(context, `/repos/${repo.owner}/${repo.name}/milestones`, {
      select: data => data as Milestone[],
      signal: options.signal,
      perPage: 100,
      page,
    }),
  )

  for await (let milestone of milestones) {
    if (milestone.title === title) {
      return milestone
    }
  }
  return null
}
