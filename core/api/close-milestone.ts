import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { Repo } from '../../types/repo'

import { NoMilestoneFoundError } from '../errors/no-milestone-found-error'
import { findMilestoneByTitle } from './find-milestone-by-title'
import { formatRepository } from '../repo/format-repository'
import { makeRequest } from './make-request'

/**
 * Close the milestone with the given title.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param title - Milestone title.
 * @param options - Cancellation.
 * @throws {NoMilestoneFoundError} When no milestone has that title.
 */
export async function closeMilestone(
  context: GitHubClientContext,
  repo: Repo,
  title: string,
  options: RequestOptions = {},
): Promise<void> {
  let milestone = await findMilestoneByTitle(context, repo, title, options)
  if (!milestone) {
    throw new NoMilestoneFoundError(title)
  }

  /* Send the milestone back as found, only with the state flipped. */
  await makeRequest(
    context,
    `/repos/${repo.owner}/${repo.name}/milestones/${milestone.number}`,
    {
      json: {
        ...(milestone.description ?
          { description: milestone.description }
        : {}),
        ...(milestone.due_on ? { due_on: milestone.due_on } : {}),
        title: milestone.title,
        state: 'closed',
      },
      signal: options.signal,
      method: 'PATCH',
    },
  )

  context.logger.info('milestone closed', {
    repository: formatRepository(repo),
    number: milestone.number,
    title,
  })
}
