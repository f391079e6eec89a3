import type { CommitRef } from './commit-ref'

/** Input of the version resolver. */
export interface VersionSpec {
  /** Always append the build suffix, even on a tagged commit. */
  long: boolean

  /** Commits since the base tag. */
  distance: number

  /** Commit the version is computed for. */
  hash: CommitRef

  /** Base version string (tag version or `0.0.1`). */
  base: string
}
