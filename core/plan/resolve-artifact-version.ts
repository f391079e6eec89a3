import type { ResolutionCache } from '../../types/resolution-cache'
import type { HistorySource } from '../../types/history-source'
import type { HistoryPoint } from '../../types/history-point'
import type { PathSet } from '../../types/path-set'

import { DEFAULT_BASE_VERSION, latestTag } from '../history/latest-tag'
import { distanceAndHash } from '../history/distance-and-hash'
import { checkBaseVersion } from '../versions/check-base-version'
import { resolveVersion } from '../versions/resolve-version'

/**
 * Resolve the version of an artifact from the history of its path set.
 *
 * The tag, distance and commit come from one history point so they always
 * refer to the same reference commit.
 *
 * @param history - History source.
 * @param pathSet - Paths whose changes affect the artifact.
 * @param options - Resolution options.
 * @param options.baseVersion - Configured base version.
 * @param options.override - Explicit version, skips history entirely.
 * @param options.cache - Run-scoped cache.
 * @param options.long - Always append the build suffix.
 * @returns Version, the history point it was computed from and warnings.
 */
export function resolveArtifactVersion(
  history: HistorySource,
  pathSet: PathSet,
  options: {
    baseVersion?: string | null
    override?: string | null
    cache?: ResolutionCache
    long?: boolean
  },
): { point: HistoryPoint | null; warnings: string[]; version: string } {
  if (options.override) {
    return { version: options.override, warnings: [], point: null }
  }

  let tag = latestTag(history, 'HEAD', options.cache)
  let point = distanceAndHash(history, tag, pathSet, options.cache)
  let version = resolveVersion(
    {
      base: tag?.version ?? DEFAULT_BASE_VERSION,
      long: options.long ?? false,
      distance: point.distance,
      hash: point.commit,
    },
    { baseVersion: options.baseVersion, tag },
  )

  let warning = point.distance > 0 || options.long
    ? checkBaseVersion(options.baseVersion, tag)
    : null
  return { warnings: warning ? [warning] : [], version, point }
}
