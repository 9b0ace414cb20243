/** Resolved service endpoints, without trailing slashes. */
export interface ApiUrls {
  /** Base URL for asset downloads (web host). */
  download: string

  /** Base URL for asset uploads. */
  upload: string

  /** Base URL of the REST API. */
  api: string
}
