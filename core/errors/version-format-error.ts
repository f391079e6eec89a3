/** A discovered or composed version is not valid SemVer2. */
export class VersionFormatError extends Error {
  /** The offending version string. */
  public readonly version: string

  /**
   * Creates a new VersionFormatError.
   *
   * @param version - Version that failed validation.
   * @param reason - Which rule it breaks.
   */
  public constructor(version: string, reason: string) {
    super(`Invalid version "${version}": ${reason}`)
    this.name = 'VersionFormatError'
    this.version = version
  }
}
