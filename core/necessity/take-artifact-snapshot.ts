import type { ResolutionCache } from '../../types/resolution-cache'
import type { ArtifactSnapshot } from '../../types/artifact-snapshot'
import type { RegistrySource } from '../../types/registry-source'

/**
 * Query local and remote existence of an image reference.
 *
 * The local engine is consulted only for single-platform builds; the
 * registry is skipped when a local image already settles a build that will
 * not be pushed. Results are memoized in the run cache.
 *
 * @param registry - Registry source.
 * @param reference - Image reference `name:tag`.
 * @param options - Query options.
 * @param options.multiPlatform - The build targets several platforms.
 * @param options.push - Push was requested.
 * @param options.cache - Run-scoped cache.
 * @returns Existence snapshot.
 */
export async function takeArtifactSnapshot(
  registry: RegistrySource,
  reference: string,
  options: {
    cache?: ResolutionCache
    multiPlatform: boolean
    push: boolean
  },
): Promise<ArtifactSnapshot> {
  let { multiPlatform, cache, push } = options

  let local = false
  if (!multiPlatform) {
    let cachedLocal = cache?.localImages.get(reference)
    local = cachedLocal ?? registry.hasLocalImage(reference)
    cache?.localImages.set(reference, local)
  }

  if (local && !push) {
    return { remote: null, local }
  }

  let remote = cache?.manifests.get(reference)
  if (remote === undefined) {
    remote = await registry.getManifest(reference)
    cache?.manifests.set(reference, remote)
  }

  return { remote, local }
}
