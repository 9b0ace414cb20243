/** Tuning for the pre-call quota guard. */
export interface QuotaOptions {
  /** Proceed immediately while remaining quota is above this value. */
  threshold: number

  /**
   * Delay in milliseconds used when the reported reset time is already in
   * the past.
   */
  fallbackDelay: number

  /**
   * Multiplier applied to the fallback delay after each consecutive wait.
   * 1 keeps the delay constant.
   */
  backoffFactor: number

  /** Maximum number of waits before proceeding anyway; undefined is no cap. */
  maxWaits: undefined | number
}
