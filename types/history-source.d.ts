/**
 * Line-oriented queries against a git working copy. All methods are
 * synchronous and throw `GitError` when the underlying command fails.
 */
export interface HistorySource {
  /** Latest commit touching any of the paths, null when none did. */
  lastCommitTouching(paths: readonly string[]): string | null

  /** True when `ancestor` is reachable from `descendant`. */
  isAncestor(ancestor: string, descendant: string): boolean

  /** Nearest tag reachable from `reference`, null when there is none. */
  describeTag(reference: string): string | null

  /** Number of commits in `from..to`, or reachable from `to` without `from`. */
  countCommits(from: string | null, to: string): number

  /** Full hash of a commit-ish. */
  resolveCommit(reference: string): string

  /** Full hash of the commit a tag points at, looked up under `refs/tags/`. */
  resolveTag(name: string): string

  /** Throws `GitError` unless the working directory is a git checkout. */
  assertWorkTree(): void
}
