/** Malformed or contradictory configuration or CLI options. */
export class ConfigError extends Error {
  /**
   * Creates a new ConfigError.
   *
   * @param message - What is wrong with the configuration.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
