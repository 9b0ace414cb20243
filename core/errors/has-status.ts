import { GitHubApiError } from './github-api-error'

/**
 * Checks whether an error is an API error with the given status.
 *
 * @param error - Any thrown value.
 * @param status - Expected HTTP status.
 * @returns True when the statuses match.
 */
export function hasStatus(error: unknown, status: number): boolean {
  return error instanceof GitHubApiError && error.status === status
}

/**
 * @param error - Any thrown value.
 * @returns True for a 404 response.
 */
export function isNotFound(error: unknown): boolean {
  return hasStatus(error, 404)
}

/**
 * @param error - Any thrown value.
 * @returns True for a 422 (validation failed) response.
 */
export function isUnprocessable(error: unknown): boolean {
  return hasStatus(error, 422)
}
