import type { Repo } from '../../types/repo'

/**
 * Formats a repository as `owner/name`.
 *
 * @param repo - Repository coordinates.
 * @returns Slug used in logs and error messages.
 */
export function formatRepository(repo: Repo): string {
  return `${repo.owner}/${repo.name}`
}
