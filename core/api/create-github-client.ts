import type { GitHubClientContext } from '../../types/github-client-context'
import type { ClientOptions } from '../../types/client-options'
import type { GitHubClient } from '../../types/github-client'

import { defaultQuotaOptions } from '../config/default-quota-options'
import { createConsoleLogger } from '../log/create-console-logger'
import { getReleaseDownloadUrl } from './get-release-download-url'
import { generateReleaseNotes } from './generate-release-notes'
import { createTransport } from '../config/create-transport'
import { resolveApiUrls } from '../config/resolve-api-urls'
import { getDefaultBranch } from './get-default-branch'
import { resolveToken } from '../config/resolve-token'
import { openPullRequest } from './open-pull-request'
import { closeMilestone } from './close-milestone'
import { getQuotaState } from './get-quota-state'
import { createRelease } from './create-release'
import { getChangelog } from './get-changelog'
import { uploadAsset } from './upload-asset'
import { createFile } from './create-file'

/**
 * Create a client bound to an immutable context built from `options`.
 *
 * Endpoints are resolved and validated here, and the transport is built
 * once, so nothing is configured per call.
 *
 * @param options - Client configuration.
 * @returns Client with bound methods.
 */
export function createGitHubClient(options: ClientOptions = {}): GitHubClient {
  let context: GitHubClientContext = Object.freeze({
    quota: Object.freeze({
      backoffFactor:
        options.quota?.backoffFactor ?? defaultQuotaOptions.backoffFactor,
      fallbackDelay:
        options.quota?.fallbackDelay ?? defaultQuotaOptions.fallbackDelay,
      threshold: options.quota?.threshold ?? defaultQuotaOptions.threshold,
      maxWaits: options.quota?.maxWaits ?? defaultQuotaOptions.maxWaits,
    }),
    transport:
      options.transport ??
      createTransport({ skipTlsVerify: options.skipTlsVerify }),
    urls: Object.freeze(resolveApiUrls(options.urls)),
    logger: options.logger ?? createConsoleLogger(),
    token: resolveToken({ token: options.token }),
  })

  return {
    uploadAsset: (repo, releaseId, artifact, requestOptions) =>
      uploadAsset(context, repo, releaseId, artifact, requestOptions),
    generateReleaseNotes: (repo, previous, current, requestOptions) =>
      generateReleaseNotes(context, repo, previous, current, requestOptions),
    changelog: (repo, previous, current, requestOptions) =>
      getChangelog(context, repo, previous, current, requestOptions),
    getReleaseDownloadUrl: (repo, tag, artifactName) =>
      getReleaseDownloadUrl(context, repo, tag, artifactName),
    createRelease: (settings, body, requestOptions) =>
      createRelease(context, settings, body, requestOptions),
    closeMilestone: (repo, title, requestOptions) =>
      closeMilestone(context, repo, title, requestOptions),
    openPullRequest: (request, requestOptions) =>
      openPullRequest(context, request, requestOptions),
    getDefaultBranch: (repo, requestOptions) =>
      getDefaultBranch(context, repo, requestOptions),
    createFile: (commit, requestOptions) =>
      createFile(context, commit, requestOptions),
    getQuotaState: requestOptions => getQuotaState(context, requestOptions),
  }
}
