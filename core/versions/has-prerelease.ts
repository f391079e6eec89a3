import semver from 'semver'

/**
 * Check whether a version carries a prerelease segment.
 *
 * @param version - SemVer2 version.
 * @returns True when the version has a `-prerelease` part.
 */
export function hasPrerelease(version: string): boolean {
  let parsed = semver.parse(version)
  if (parsed) {
    return parsed.prerelease.length > 0
  }
  let [core = version] = version.split('+', 1)
  return core.includes('-')
}
