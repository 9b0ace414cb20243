/** How a newly supplied release body combines with the existing one. */
export type ReleaseNotesMode =
  | 'keep-existing'
  | 'prepend'
  | 'replace'
  | 'append'
