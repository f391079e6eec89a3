import type { HistorySource } from '../../types/history-source'

import { GitError } from '../errors/git-error'
import { runGit } from './run-git'

/** Messages git prints when `describe` finds no tag. */
const NO_TAG_MESSAGES = [
  'No names found',
  'No tags can describe',
  'cannot describe anything',
]

/**
 * Create a history source backed by the git executable.
 *
 * Shallow clones are not detected: counts and hashes computed from a
 * truncated history are silently wrong, so callers must fetch full history.
 *
 * @param cwd - Root of the working copy.
 * @returns History source bound to `cwd`.
 */
export function createGitHistory(cwd: string): HistorySource {
  return {
    assertWorkTree: () => {
      let inside: string
      try {
        inside = runGit(cwd, ['rev-parse', '--is-inside-work-tree'])
      } catch (error) {
        if (error instanceof GitError) {
          throw new GitError(`${cwd} is not a git checkout`, {
            exitCode: error.exitCode,
            stderr: error.stderr,
            args: error.args,
          })
        }
        throw error
      }
      if (inside !== 'true') {
        throw new GitError(`${cwd} is not a git work tree`)
      }

      try {
        runGit(cwd, ['rev-parse', '--verify', 'HEAD'])
      } catch (error) {
        if (error instanceof GitError) {
          throw new GitError('Repository has no commits', {
            exitCode: error.exitCode,
            stderr: error.stderr,
            args: error.args,
          })
        }
        throw error
      }
    },
    describeTag: reference => {
      try {
        return runGit(cwd, ['describe', '--tags', '--abbrev=0', reference])
      } catch (error) {
        if (
          error instanceof GitError &&
          NO_TAG_MESSAGES.some(message => error.stderr.includes(message))
        ) {
          return null
        }
        throw error
      }
    },
    isAncestor: (ancestor, descendant) => {
      try {
        runGit(cwd, ['merge-base', '--is-ancestor', ancestor, descendant])
        return true
      } catch (error) {
        if (error instanceof GitError && error.exitCode === 1) {
          return false
        }
        throw error
      }
    },
    lastCommitTouching: paths => {
      let output = runGit(cwd, [
        'log',
        '--max-count=1',
        '--pretty=format:%H',
        '--',
        ...paths,
      ])
      return output || null
    },
    countCommits: (from, to) => {
      let range = from ? `${from}..${to}` : to
      let output = runGit(cwd, ['rev-list', '--count', range])
      let count = Number.parseInt(output, 10)
      if (!Number.isInteger(count) || count < 0) {
        throw new GitError(`Unexpected commit count "${output}"`, {
          args: ['rev-list', '--count', range],
        })
      }
      return count
    },
    resolveCommit: reference =>
      runGit(cwd, ['rev-list', '--max-count=1', reference]),
    resolveTag: name =>
      runGit(cwd, ['rev-parse', '--verify', `refs/tags/${name}^{commit}`]),
  }
}
