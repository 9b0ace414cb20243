import type { QuotaOptions } from './quota-options'
import type { Transport } from './transport'
import type { ApiUrls } from './api-urls'
import type { Logger } from './logger'

/**
 * Internal client context shared by all API functions.
 *
 * Built once by `createGitHubClient` and never mutated afterwards, so
 * concurrent callers can share it.
 */
export interface GitHubClientContext {
  /** Quota guard tuning. */
  readonly quota: Readonly<QuotaOptions>

  /** HTTP exchange used for every call. */
  readonly transport: Transport

  /** Token, if available. */
  readonly token: undefined | string

  /** Service endpoints. */
  readonly urls: Readonly<ApiUrls>

  /** Structured log sink. */
  readonly logger: Logger
}
