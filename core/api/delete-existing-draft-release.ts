import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { Repo } from '../../types/repo'

import { isNotFound } from '../errors/has-status'
import { requestPage } from './request-page'
import { makeRequest } from './make-request'
import { paginate } from './paginate'

type Release = components['schemas']['release']

/**
 * Delete the first draft release with the given name.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param name - Release name to match.
 * @param options - Cancellation.
 * @returns True when a draft was found and is gone.
 */
export async function deleteExistingDraftRelease(
  context: GitHubClientContext,
  repo: Repo,
  name: string,
  options: RequestOptions = {},
): Promise<boolean> {
  let prefix = `/repos/${repo.owner}/${repo.name}/releases`
  let releases = paginate(page =>
    requestPage(context, prefix, {
      select: data => data as Release[],
      signal: options.signal,
      perPage: 50,
      page,
    }),
  )

  let draft: Release | undefined
  try {
    for await (let release of releases) {
      if (release.draft && release.name === name) {
        draft = release
        break
      }
    }
  } catch (error) {
    throw new Error('could not delete existing drafts', { cause: error })
  }

  if (!draft) {
    return false
  }

  try {
    await makeRequest(context, `${prefix}/${draft.id}`, {
      signal: options.signal,
      method: 'DELETE',
    })
  } catch (error) {
    if (!isNotFound(error)) {
      throw new Error('could not delete previous draft release', {
        cause: error,
      })
    }
  }

  context.logger.info('deleted previous draft release', {
    commit: draft.target_commitish,
    tag: draft.tag_name,
    name: draft.name,
  })
  return true
}
