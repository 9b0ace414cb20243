/** Per-call options accepted by every remote operation. */
export interface RequestOptions {
  /** Aborts the call, including any quota wait in front of it. */
  signal?: AbortSignal
}
