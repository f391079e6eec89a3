import semver from 'semver'

/**
 * Strip a single leading `v` from a tag name when the remainder is a valid
 * SemVer2 version, so it can be used as a chart version.
 *
 * @param name - Tag or version string.
 * @returns Name without the `v` prefix, or the input unchanged.
 */
export function stripVersionPrefix(name: string): string {
  if (/^v/u.test(name)) {
    let rest = name.slice(1)
    if (semver.valid(rest)) {
      return rest
    }
  }
  return name
}
