import { execFileSync } from 'node:child_process'

import { readErrorProperty } from '../utils/read-error-property'
import { GitError } from '../errors/git-error'

/**
 * Run a git command synchronously and return its trimmed standard output.
 *
 * @param cwd - Working copy to run in.
 * @param args - Arguments after `git`.
 * @returns Trimmed stdout.
 * @throws {GitError} When git is missing or exits with a non-zero status.
 */
export function runGit(cwd: string, args: string[]): string {
  try {
    let output = execFileSync('git', args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      encoding: 'utf8',
      cwd,
    })
    return output.trim()
  } catch (error) {
    let stderr = readErrorProperty(error, 'stderr')
    let exitCode = readErrorProperty(error, 'status')
    let code = readErrorProperty(error, 'code')

    if (code === 'ENOENT') {
      throw new GitError('git executable not found in PATH', { args })
    }

    let detail = typeof stderr === 'string' ? stderr.trim() : ''
    throw new GitError(
      `git ${args.join(' ')} failed${detail ? `: ${detail}` : ''}`,
      {
        exitCode: typeof exitCode === 'number' ? exitCode : null,
        stderr: detail,
        args,
      },
    )
  }
}
