/** Remote repository coordinates, optionally pinned to a branch. */
export interface Repo {
  /** Branch name; empty or undefined means the default branch. */
  branch?: string

  /** Account or organization owning the repository. */
  owner: string

  /** Repository name. */
  name: string
}
