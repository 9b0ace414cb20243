import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { ReleaseNotesMode } from '../../types/release-notes-mode'
import type { RequestOptions } from '../../types/request-options'
import type { ReleasePayload } from '../../types/release-payload'
import type { Repo } from '../../types/repo'

import { mergeReleaseNotes } from './merge-release-notes'
import { fitReleaseBody } from './truncate-release-body'
import { getReleaseByTag } from './get-release-by-tag'
import { makeRequest } from './make-request'

type Release = components['schemas']['release']

/**
 * Create the release for `payload.tag_name`, or merge the body into the
 * existing one and update it.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param payload - Release fields.
 * @param mode - Body merge policy for an existing release.
 * @param options - Cancellation.
 * @returns Release as returned by the server.
 */
export async function createOrUpdateRelease(
  context: GitHubClientContext,
  repo: Repo,
  payload: ReleasePayload,
  mode: ReleaseNotesMode,
  options: RequestOptions = {},
): Promise<Release> {
  let prefix = `/repos/${repo.owner}/${repo.name}/releases`
  let existing = await getReleaseByTag(context, repo, payload.tag_name, options)

  if (!existing) {
    let response = await makeRequest(context, prefix, {
      signal: options.signal,
      method: 'POST',
      json: payload,
    })
    let release = response.data as Release
    context.logger.info('release created', {
      'request-id': response.requestId,
      'release-id': release.id,
      name: payload.name,
    })
    return release
  }

  let body = fitReleaseBody(
    context.logger,
    mergeReleaseNotes(existing.body ?? '', payload.body, mode),
  )
  let response = await makeRequest(context, `${prefix}/${existing.id}`, {
    json: { ...payload, body },
    signal: options.signal,
    method: 'PATCH',
  })
  let release = response.data as Release
  context.logger.info('release updated', {
    'request-id': response.requestId,
    'release-id': release.id,
    name: payload.name,
  })
  return release
}
