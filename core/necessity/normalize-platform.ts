/**
 * Normalize a platform name: lowercase, and `linux/` prepended to bare
 * architectures so `amd64` and `linux/amd64` compare equal.
 *
 * @param platform - Platform as written in config or on the command line.
 * @returns Normalized platform.
 */
export function normalizePlatform(platform: string): string {
  let normalized = platform.trim().toLowerCase()
  return normalized.includes('/') ? normalized : `linux/${normalized}`
}
