import { normalizePlatform } from './normalize-platform'

/**
 * Remove skipped platforms from the requested ones.
 *
 * @param requested - Platforms requested for the build.
 * @param skipped - Platforms configured as skipped for the image.
 * @returns Normalized, de-duplicated platforms still to provide, in request
 *   order.
 */
export function requiredPlatforms(
  requested: readonly string[],
  skipped: readonly string[] = [],
): string[] {
  let skip = new Set(skipped.map(normalizePlatform))
  let result = new Set<string>()
  for (let platform of requested) {
    let normalized = normalizePlatform(platform)
    if (!skip.has(normalized)) {
      result.add(normalized)
    }
  }
  return [...result]
}
