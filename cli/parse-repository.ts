import type { Repo } from '../types/repo'

/**
 * Parses `owner/name` or `owner/name:branch`.
 *
 * @param value - Raw argument.
 * @returns Repository coordinates.
 */
export function parseRepository(value: string): Repo {
  let match = value
    .trim()
    .match(/^(?<owner>[^/:\s]+)\/(?<name>[^/:\s]+)(?::(?<branch>\S+))?$/u)
  let groups = match?.groups
  if (!groups?.['owner'] || !groups['name']) {
    throw new Error(
      `Invalid repository "${value}". Expected "owner/name" or "owner/name:branch".`,
    )
  }

  let repo: Repo = { owner: groups['owner'], name: groups['name'] }
  if (groups['branch']) {
    repo.branch = groups['branch']
  }
  return repo
}
