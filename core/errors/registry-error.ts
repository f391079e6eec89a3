/** A registry, chart index or container engine query failed. */
export class RegistryError extends Error {
  /** HTTP status when the failure came from a response. */
  public readonly status: number | null

  /**
   * Creates a new RegistryError.
   *
   * @param message - Description of the failure.
   * @param status - HTTP status code, if any.
   */
  public constructor(message: string, status: number | null = null) {
    super(message)
    this.name = 'RegistryError'
    this.status = status
  }
}
