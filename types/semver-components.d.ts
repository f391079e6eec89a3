/** Numeric release components of a SemVer2 version. */
export interface SemverComponents {
  major: number
  minor: number
  patch: number
}
