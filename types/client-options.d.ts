import type { QuotaOptions } from './quota-options'
import type { Transport } from './transport'
import type { Logger } from './logger'

/** Configuration accepted by `createGitHubClient`. */
export interface ClientOptions {
  /**
   * Endpoint overrides, already rendered. `upload` is only honoured together
   * with `api`.
   */
  urls?: {
    download?: string
    upload?: string
    api?: string
  }

  /** Disable TLS certificate verification for the default transport. */
  skipTlsVerify?: boolean

  /** Quota guard tuning; missing fields take the defaults. */
  quota?: Partial<QuotaOptions>

  /** Replaces the default undici transport (tests, custom stacks). */
  transport?: Transport

  /** Token; resolved from the environment when omitted. */
  token?: string

  /** Log sink; defaults to the console logger. */
  logger?: Logger
}
