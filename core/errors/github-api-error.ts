/** Non-2xx response from the API. */
export class GitHubApiError extends Error {
  /** Value of the `X-GitHub-Request-Id` response header, when sent. */
  public readonly requestId: undefined | string

  /** HTTP status code. */
  public readonly status: number

  /**
   * Creates a new GitHubApiError.
   *
   * @param status - HTTP status code.
   * @param message - Human readable description.
   * @param requestId - Correlation id reported by the server.
   */
  public constructor(
    status: number,
    message: string,
    requestId?: undefined | string,
  ) {
    super(message)
    this.name = 'GitHubApiError'
    this.requestId = requestId
    this.status = status
  }
}
