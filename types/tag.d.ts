import type { SemverComponents } from './semver-components'

/** A git tag read from history and parsed as SemVer2. */
export interface Tag {
  /** Prerelease segment without the leading `-` (e.g. `beta.1`). */
  prerelease: string | null

  /** Release components of the version. */
  base: SemverComponents

  /** Version with a leading `v` stripped (e.g. `1.2.3`). */
  version: string

  /** Raw tag name as stored in git (e.g. `v1.2.3`). */
  name: string
}
