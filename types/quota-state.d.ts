/** Snapshot of the core API quota, read fresh before each call. */
export interface QuotaState {
  /** Calls left in the current window. */
  remaining: number

  /** When the window resets. */
  resetAt: Date
}
