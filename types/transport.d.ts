/** Request handed to a transport. */
export interface TransportRequest {
  /** Encoded body, if any. */
  body?: Uint8Array | string

  /** Final request headers. */
  headers: Record<string, string>

  /** Cancellation signal from the caller. */
  signal?: AbortSignal

  /** HTTP method. */
  method: string
}

/**
 * Minimal subset of the Fetch API Response consumed by the client.
 * Implementations (undici, the global fetch, test doubles) must provide these
 * members.
 */
export interface TransportResponse {
  /** Response headers. */
  headers: { get(name: string): string | null }

  /** Read body as text. */
  text(): Promise<string>

  /** Status text provided by the server (e.g., "Not Found"). */
  statusText: string

  /** Numeric HTTP status code. */
  status: number

  /** True when HTTP status indicates success (2xx). */
  ok: boolean
}

/** Performs a single HTTP exchange. */
export type Transport = (
  url: string,
  request: TransportRequest,
) => Promise<TransportResponse>
