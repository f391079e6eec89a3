import type { CommitRef } from './commit-ref'
import type { Tag } from './tag'

/**
 * Tag, distance and commit resolved against one reference commit. Produced by
 * a single history query so the three values never mix references.
 */
export interface HistoryPoint {
  /** Latest commit touching the path set, or the tag commit if newer. */
  commit: CommitRef

  /** Commits between the tag and `commit`. */
  distance: number

  /** Nearest reachable tag, null when the branch has none. */
  tag: Tag | null
}
