import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { Artifact } from '../../types/artifact'
import type { Repo } from '../../types/repo'

import { GitHubApiError } from '../errors/github-api-error'
import { RetriableError } from '../errors/retriable-error'
import { isUnprocessable } from '../errors/has-status'
import { makeRequest } from './make-request'

/**
 * Upload one artifact to a release in a single request.
 *
 * A validation failure (422) is permanent and rethrown as-is; any other
 * failure is wrapped in a `RetriableError` for the caller's retry policy.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param releaseId - Release id as returned by `createRelease`.
 * @param artifact - Name and bytes.
 * @param options - Cancellation.
 */
export async function uploadAsset(
  context: GitHubClientContext,
  repo: Repo,
  releaseId: string,
  artifact: Artifact,
  options: RequestOptions = {},
): Promise<void> {
  if (!/^\d+$/u.test(releaseId)) {
    throw new Error(`invalid release id "${releaseId}"`)
  }

  try {
    await makeRequest(
      context,
      `/repos/${repo.owner}/${repo.name}/releases/${releaseId}/assets?name=${encodeURIComponent(artifact.name)}`,
      {
        headers: { 'Content-Type': 'application/octet-stream' },
        signal: options.signal,
        rawBody: artifact.content,
        target: 'upload',
        method: 'POST',
      },
    )
  } catch (error) {
    context.logger.warn('upload failed', {
      'request-id':
        error instanceof GitHubApiError ? (error.requestId ?? '') : '',
      'release-id': releaseId,
      name: artifact.name,
    })
    if (isUnprocessable(error) || options.signal?.aborted) {
      throw error
    }
    throw new RetriableError(error)
  }
}
