/** A file to attach to a release. */
export interface Artifact {
  /** Raw bytes to upload. */
  content: Uint8Array

  /** Display name of the asset. */
  name: string
}
