import type { GitHubClientContext } from '../../types/github-client-context'
import type { Repo } from '../../types/repo'

/**
 * Public download URL of a release asset.
 *
 * @param context - Client context.
 * @param repo - Repository.
 * @param tag - Release tag.
 * @param artifactName - Asset name.
 * @returns Absolute URL.
 */
export function getReleaseDownloadUrl(
  context: GitHubClientContext,
  repo: Repo,
  tag: string,
  artifactName: string,
): string {
  return (
    `${context.urls.download}/${repo.owner}/${repo.name}/releases/download/` +
    `${encodeURIComponent(tag)}/${encodeURIComponent(artifactName)}`
  )
}
