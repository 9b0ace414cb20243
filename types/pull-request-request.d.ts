import type { Repo } from './repo'

/** Input of `openPullRequest`. */
export interface PullRequestRequest {
  /** Repository and branch receiving the changes. */
  base: Repo

  /** Repository and branch holding the changes. */
  head: Repo

  /** Open as draft. */
  draft: boolean

  /** Pull request title. */
  title: string
}
