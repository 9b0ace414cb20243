import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'

import type { GitHubClient } from '../types/github-client'
import type { Logger } from '../types/logger'
import type { Repo } from '../types/repo'

import { retryRetriable } from '../core/retry/retry-retriable'
import { describeError } from '../core/errors/describe-error'

/**
 * Uploads files one by one, retrying each whole upload while it fails with
 * a retriable error.
 *
 * @param client - Release client.
 * @param parameters - Upload parameters.
 * @param parameters.releaseId - Target release id.
 * @param parameters.attempts - Attempts per file.
 * @param parameters.logger - Log sink for retries.
 * @param parameters.signal - Cancellation.
 * @param parameters.files - Paths of the files to upload.
 * @param parameters.repo - Repository.
 * @returns Uploaded asset names.
 */
export async function uploadArtifacts(
  client: GitHubClient,
  parameters: {
    signal?: AbortSignal
    releaseId: string
    attempts?: number
    files: string[]
    logger: Logger
    repo: Repo
  },
): Promise<string[]> {
  let { releaseId, attempts, logger, signal, files, repo } = parameters
  let uploaded: string[] = []

  for (let file of files) {
    let name = basename(file)
    let content = await readFile(file)
    await retryRetriable(
      () => client.uploadAsset(repo, releaseId, { content, name }, { signal }),
      {
        onRetry: (error, attempt) =>
          logger.warn('retrying upload', {
            error: describeError(error),
            attempt,
            name,
          }),
        attempts,
        signal,
      },
    )
    uploaded.push(name)
  }

  return uploaded
}
