import type { PullRequestRequest } from './pull-request-request'
import type { ReleaseSettings } from './release-settings'
import type { RequestOptions } from './request-options'
import type { QuotaState } from './quota-state'
import type { FileCommit } from './file-commit'
import type { Artifact } from './artifact'
import type { Repo } from './repo'

/**
 * Public API surface of the release publishing client.
 *
 * Methods are thin wrappers around lower-level functions bound to an
 * immutable client context (transport, auth, endpoints, quota settings,
 * logger). Every remote call waits for quota first and accepts an abort
 * signal.
 */
export interface GitHubClient {
  /** Upload an artifact; 422 is permanent, anything else is retriable. */
  uploadAsset(
    repo: Repo,
    releaseId: string,
    artifact: Artifact,
    options?: RequestOptions,
  ): Promise<void>

  /** Server generated release notes between two tags. */
  generateReleaseNotes(
    repo: Repo,
    previous: string,
    current: string,
    options?: RequestOptions,
  ): Promise<string>

  /** One formatted line per commit between two refs, in server order. */
  changelog(
    repo: Repo,
    previous: string,
    current: string,
    options?: RequestOptions,
  ): Promise<string[]>

  /** Upsert the release for a tag; resolves to the release id. */
  createRelease(
    settings: ReleaseSettings,
    body: string,
    options?: RequestOptions,
  ): Promise<string>

  /** Download URL of an uploaded asset. */
  getReleaseDownloadUrl(
    repo: Repo,
    tag: string,
    artifactName: string,
  ): string

  /** Close a milestone by title; rejects with `NoMilestoneFoundError`. */
  closeMilestone(
    repo: Repo,
    title: string,
    options?: RequestOptions,
  ): Promise<void>

  /** Open a pull request; validation failures only log a warning. */
  openPullRequest(
    request: PullRequestRequest,
    options?: RequestOptions,
  ): Promise<void>

  /** Commit one file, creating the branch when needed. */
  createFile(commit: FileCommit, options?: RequestOptions): Promise<void>

  /** Default branch of a repository. */
  getDefaultBranch(repo: Repo, options?: RequestOptions): Promise<string>

  /** Current quota, read without waiting. */
  getQuotaState(options?: RequestOptions): Promise<QuotaState>
}
