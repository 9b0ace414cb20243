/** Body sent to the create and edit release endpoints. */
export interface ReleasePayload {
  discussion_category_name?: string
  target_commitish?: string
  prerelease: boolean
  tag_name: string
  draft: boolean
  body: string
  name: string
}
