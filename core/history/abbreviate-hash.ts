import type { CommitRef } from '../../types/commit-ref'

import { GitError } from '../errors/git-error'

/** Length of the hash embedded in generated versions. */
export const ABBREVIATED_HASH_LENGTH = 7

/**
 * Build a CommitRef from a full commit hash.
 *
 * @param hash - Full hex hash.
 * @returns Commit reference with the lowercase 7-character short hash.
 */
export function abbreviateHash(hash: string): CommitRef {
  let normalized = hash.trim().toLowerCase()
  if (!/^[\da-f]{7,64}$/u.test(normalized)) {
    throw new GitError(`Unexpected commit hash "${hash}"`)
  }

  return {
    abbreviatedHash: normalized.slice(0, ABBREVIATED_HASH_LENGTH),
    hash: normalized,
  }
}
