/** Identity recorded as committer of published files. */
export interface CommitAuthor {
  email: string
  name: string
}
