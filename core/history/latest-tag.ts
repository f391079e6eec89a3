import type { ResolutionCache } from '../../types/resolution-cache'
import type { HistorySource } from '../../types/history-source'
import type { Tag } from '../../types/tag'

import { parseTag } from './parse-tag'

/** Base version used when the branch carries no tag. */
export const DEFAULT_BASE_VERSION = '0.0.1'

/**
 * Find the most recent tag reachable from a reference.
 *
 * @param history - History source.
 * @param reference - Branch or commit to start from.
 * @param cache - Run-scoped cache.
 * @returns Parsed tag, or null when no tag is reachable.
 */
export function latestTag(
  history: HistorySource,
  reference: string = 'HEAD',
  cache?: ResolutionCache,
): Tag | null {
  let cached = cache?.tags.get(reference)
  if (cached !== undefined) {
    return cached
  }

  let name = history.describeTag(reference)
  let tag = name ? parseTag(name) : null
  cache?.tags.set(reference, tag)
  return tag
}
