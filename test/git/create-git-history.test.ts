import { beforeEach, describe, expect, it, vi } from 'vitest'

import { GitError } from '../../core/errors/git-error'

vi.mock(import('../../core/git/run-git'), () => ({
  runGit: vi.fn(),
}))

describe('createGitHistory', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('describes the nearest tag', async () => {
    let { runGit } = await import('../../core/git/run-git')
    let { createGitHistory } = await import('../../core/git/create-git-history')
    vi.mocked(runGit).mockReturnValue('v1.2.3')

    expect(createGitHistory('/repo').describeTag('HEAD')).toBe('v1.2.3')
    expect(runGit).toHaveBeenCalledWith('/repo', [
      'describe',
      '--tags',
      '--abbrev=0',
      'HEAD',
    ])
  })

  it('returns null when no tag exists', async () => {
    let { runGit } = await import('../../core/git/run-git')
    let { createGitHistory } = await import('../../core/git/create-git-history')
    vi.mocked(runGit).mockImplementation(() => {
      throw new GitError('failed', {
        stderr: 'fatal: No names found, cannot describe anything.',
        exitCode: 128,
      })
    })

    expect(createGitHistory('/repo').describeTag('HEAD')).toBeNull()
  })

  it('propagates other describe failures', async () => {
    let { runGit } = await import('../../core/git/run-git')
    let { createGitHistory } = await import('../../core/git/create-git-history')
    vi.mocked(runGit).mockImplementation(() => {
      throw new GitError('failed', {
        stderr: 'fatal: not a git repository',
        exitCode: 128,
      })
    })

    expect(() => createGitHistory('/repo').describeTag('HEAD')).toThrowError(
      GitError,
    )
  })

  it('maps merge-base exit codes', async () => {
    let { runGit } = await import('../../core/git/run-git')
    let { createGitHistory } = await import('../../core/git/create-git-history')
    let history = createGitHistory('/repo')

    vi.mocked(runGit).mockReturnValueOnce('')
    expect(history.isAncestor('aaa', 'bbb')).toBeTruthy()

    vi.mocked(runGit).mockImplementationOnce(() => {
      throw new GitError('failed', { exitCode: 1 })
    })
    expect(history.isAncestor('bbb', 'aaa')).toBeFalsy()

    vi.mocked(runGit).mockImplementationOnce(() => {
      throw new GitError('failed', { exitCode: 128 })
    })
    expect(() => history.isAncestor('bbb', 'zzz')).toThrowError(GitError)
  })

  it('counts commits in a range', async () => {
    let { runGit } = await import('../../core/git/run-git')
    let { createGitHistory } = await import('../../core/git/create-git-history')
    let history = createGitHistory('/repo')
    vi.mocked(runGit).mockReturnValue('4')

    expect(history.countCommits('v1.0.0', 'abc1234')).toBe(4)
    expect(runGit).toHaveBeenLastCalledWith('/repo', [
      'rev-list',
      '--count',
      'v1.0.0..abc1234',
    ])

    expect(history.countCommits(null, 'abc1234')).toBe(4)
    expect(runGit).toHaveBeenLastCalledWith('/repo', [
      'rev-list',
      '--count',
      'abc1234',
    ])
  })

  it('rejects unexpected counts', async () => {
    let { runGit } = await import('../../core/git/run-git')
    let { createGitHistory } = await import('../../core/git/create-git-history')
    vi.mocked(runGit).mockReturnValue('many')

    expect(() => createGitHistory('/repo').countCommits(null, 'HEAD')).toThrowError(
      'Unexpected commit count "many"',
    )
  })

  it('resolves tags under refs/tags', async () => {
    let { runGit } = await import('../../core/git/run-git')
    let { createGitHistory } = await import('../../core/git/create-git-history')
    vi.mocked(runGit).mockReturnValue('abc1234def')

    expect(createGitHistory('/repo').resolveTag('v1.2.3')).toBe('abc1234def')
    expect(runGit).toHaveBeenCalledWith('/repo', [
      'rev-parse',
      '--verify',
      'refs/tags/v1.2.3^{commit}',
    ])
  })

  it('queries the last commit touching all paths at once', async () => {
    let { runGit } = await import('../../core/git/run-git')
    let { createGitHistory } = await import('../../core/git/create-git-history')
    let history = createGitHistory('/repo')

    vi.mocked(runGit).mockReturnValueOnce('abc1234def')
    expect(history.lastCommitTouching(['chart', 'images/app'])).toBe(
      'abc1234def',
    )
    expect(runGit).toHaveBeenCalledWith('/repo', [
      'log',
      '--max-count=1',
      '--pretty=format:%H',
      '--',
      'chart',
      'images/app',
    ])

    vi.mocked(runGit).mockReturnValueOnce('')
    expect(history.lastCommitTouching(['new'])).toBeNull()
  })

  it('rejects directories without commits', async () => {
    let { runGit } = await import('../../core/git/run-git')
    let { createGitHistory } = await import('../../core/git/create-git-history')
    vi.mocked(runGit)
      .mockReturnValueOnce('true')
      .mockImplementationOnce(() => {
        throw new GitError('failed', { exitCode: 128 })
      })

    expect(() => createGitHistory('/repo').assertWorkTree()).toThrowError(
      'Repository has no commits',
    )
  })

  it('rejects directories outside a checkout', async () => {
    let { runGit } = await import('../../core/git/run-git')
    let { createGitHistory } = await import('../../core/git/create-git-history')
    vi.mocked(runGit).mockImplementationOnce(() => {
      throw new GitError('failed', { exitCode: 128 })
    })

    expect(() => createGitHistory('/tmp/x').assertWorkTree()).toThrowError(
      '/tmp/x is not a git checkout',
    )
  })
})
