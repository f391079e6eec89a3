/** A commit identified by its full hash and the short form used in tags. */
export interface CommitRef {
  /** First 7 lowercase hex characters of the hash. */
  abbreviatedHash: string

  /** Full commit hash. */
  hash: string
}
