import type { ResolutionCache } from '../../types/resolution-cache'

/**
 * Create an empty cache for one top-level run.
 *
 * @returns Cache with its own maps and a `clear` that empties them.
 */
export function createResolutionCache(): ResolutionCache {
  let cache: ResolutionCache = {
    clear: () => {
      cache.historyPoints.clear()
      cache.localImages.clear()
      cache.manifests.clear()
      cache.tags.clear()
    },
    historyPoints: new Map(),
    localImages: new Map(),
    manifests: new Map(),
    tags: new Map(),
  }
  return cache
}
