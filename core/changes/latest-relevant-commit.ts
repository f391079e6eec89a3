import type { HistorySource } from '../../types/history-source'
import type { PathSet } from '../../types/path-set'
import type { Tag } from '../../types/tag'

/**
 * Find the commit a version is computed for: the latest commit touching any
 * path of the set, or the tagged commit when the tag is newer.
 *
 * The path set is queried as a whole so the answer is the latest commit
 * across all paths, not a per-path maximum.
 *
 * @param history - History source.
 * @param pathSet - Paths whose changes matter.
 * @param tag - Nearest reachable tag, null for none.
 * @returns Full hash of the relevant commit.
 */
export function latestRelevantCommit(
  history: HistorySource,
  pathSet: PathSet,
  tag: Tag | null,
): string {
  let modified = history.lastCommitTouching(pathSet.paths)
  let tagged = tag ? history.resolveTag(tag.name) : null

  if (!modified) {
    return tagged ?? history.resolveCommit('HEAD')
  }
  if (!tagged) {
    return modified
  }

  /** A tag on a newer commit than the last change wins. */
  return history.isAncestor(tagged, modified) ? modified : tagged
}
