/** A git query failed or the working directory is not a usable checkout. */
export class GitError extends Error {
  /** Exit code of the failed command, null when it did not run. */
  public readonly exitCode: number | null

  /** Arguments passed to git, empty when no command was run. */
  public readonly args: string[]

  /** Standard error of the failed command. */
  public readonly stderr: string

  /**
   * Creates a new GitError.
   *
   * @param message - Description of the failure.
   * @param details - Command context.
   * @param details.exitCode - Process exit code.
   * @param details.args - Git arguments.
   * @param details.stderr - Captured standard error.
   */
  public constructor(
    message: string,
    details: { exitCode?: number | null; stderr?: string; args?: string[] } = {},
  ) {
    super(message)
    this.name = 'GitError'
    this.args = details.args ?? []
    this.stderr = details.stderr ?? ''
    this.exitCode = details.exitCode ?? null
  }
}
