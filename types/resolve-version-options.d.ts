import type { Tag } from './tag'

/** Caller-provided inputs that shape version resolution. */
export interface ResolveVersionOptions {
  /**
   * Configured base version: a literal SemVer2 string or one of `major`,
   * `minor`, `patch`.
   */
  baseVersion?: string | null

  /** Explicit version returned verbatim. */
  override?: string | null

  /** Tag discovered in history, used by keyword base versions. */
  tag?: Tag | null
}
