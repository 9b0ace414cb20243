export type { PullRequestRequest } from '../types/pull-request-request'
export type { GitHubClientContext } from '../types/github-client-context'
export type { ReleaseNotesMode } from '../types/release-notes-mode'
export type { ReleaseSettings } from '../types/release-settings'
export type { RequestOptions } from '../types/request-options'
export type { ClientOptions } from '../types/client-options'
export type { GitHubClient } from '../types/github-client'
export type { QuotaOptions } from '../types/quota-options'
export type { CommitAuthor } from '../types/commit-author'
export type { LogFields, Logger } from '../types/logger'
export type { QuotaState } from '../types/quota-state'
export type { FileCommit } from '../types/file-commit'
export type { Transport } from '../types/transport'
export type { Artifact } from '../types/artifact'
export type { Page } from '../types/page'
export type { Repo } from '../types/repo'

export {
  truncateReleaseBody,
  maxReleaseBodyLength,
} from './api/truncate-release-body'
export { NoMilestoneFoundError } from './errors/no-milestone-found-error'
export { isNotFound, isUnprocessable } from './errors/has-status'
export { RetriableError, isRetriable } from './errors/retriable-error'
export { createConsoleLogger } from './log/create-console-logger'
export { createSilentLogger } from './log/create-silent-logger'
export { createGitHubClient } from './api/create-github-client'
export { mergeReleaseNotes } from './api/merge-release-notes'
export { GitHubApiError } from './errors/github-api-error'
export { retryRetriable } from './retry/retry-retriable'
export { createTransport } from './config/create-transport'
export { paginate } from './api/paginate'
