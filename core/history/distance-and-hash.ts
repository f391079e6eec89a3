import type { ResolutionCache } from '../../types/resolution-cache'
import type { HistorySource } from '../../types/history-source'
import type { HistoryPoint } from '../../types/history-point'
import type { PathSet } from '../../types/path-set'
import type { Tag } from '../../types/tag'

import { latestRelevantCommit } from '../changes/latest-relevant-commit'
import { abbreviateHash } from './abbreviate-hash'

/**
 * Resolve the commit relevant to a path set and count the commits separating
 * it from the reference tag.
 *
 * When nothing in the path set changed after the tag, the relevant commit is
 * the tagged commit and the distance is 0.
 *
 * @param history - History source.
 * @param reference - Tag the distance is measured from, null for none.
 * @param pathSet - Paths whose changes matter.
 * @param cache - Run-scoped cache.
 * @returns History point combining tag, distance and commit.
 */
export function distanceAndHash(
  history: HistorySource,
  reference: Tag | null,
  pathSet: PathSet,
  cache?: ResolutionCache,
): HistoryPoint {
  let cacheKey = `${reference?.name ?? ''}\u0000${pathSet.key}`
  let cached = cache?.historyPoints.get(cacheKey)
  if (cached) {
    return cached
  }

  let commit = latestRelevantCommit(history, pathSet, reference)
  let tagged = reference ? history.resolveTag(reference.name) : null
  let distance = history.countCommits(tagged, commit)

  let point: HistoryPoint = {
    commit: abbreviateHash(commit),
    tag: reference,
    distance,
  }
  cache?.historyPoints.set(cacheKey, point)
  return point
}
