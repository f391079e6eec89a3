import type { RemoteManifest } from '../../types/remote-manifest'

import { normalizePlatform } from './normalize-platform'

/**
 * List required platforms a manifest does not provide. A required platform
 * without variant is satisfied by any variant of it (`linux/arm64` by
 * `linux/arm64/v8`).
 *
 * @param manifest - Registry manifest.
 * @param required - Normalized required platforms.
 * @returns Platforms missing from the manifest.
 */
export function missingPlatforms(
  manifest: RemoteManifest,
  required: readonly string[],
): string[] {
  let available = manifest.platforms.map(normalizePlatform)
  return required.filter(
    platform =>
      !available.some(
        candidate =>
          candidate === platform || candidate.startsWith(`${platform}/`),
      ),
  )
}
