import { beforeEach, describe, expect, it, vi } from 'vitest'

import { writeChartFiles } from '../../core/values/write-chart-files'

vi.mock(import('node:fs/promises'), () => ({
  writeFile: vi.fn(),
  rename: vi.fn(),
  rm: vi.fn(),
}))

let updates = [
  { path: '/repo/mychart/Chart.yaml', content: 'a: 1\n', changes: [] },
  { path: '/repo/mychart/values.yaml', content: 'b: 2\n', changes: [] },
]

describe('writeChartFiles', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('stages every file before replacing the targets', async () => {
    let { writeFile, rename, rm } = await import('node:fs/promises')
    await writeChartFiles(updates)

    expect(writeFile).toHaveBeenNthCalledWith(
      1,
      '/repo/mychart/Chart.yaml.chartwright-tmp',
      'a: 1\n',
      'utf8',
    )
    expect(writeFile).toHaveBeenNthCalledWith(
      2,
      '/repo/mychart/values.yaml.chartwright-tmp',
      'b: 2\n',
      'utf8',
    )
    expect(rename).toHaveBeenNthCalledWith(
      1,
      '/repo/mychart/Chart.yaml.chartwright-tmp',
      '/repo/mychart/Chart.yaml',
    )
    expect(rename).toHaveBeenNthCalledWith(
      2,
      '/repo/mychart/values.yaml.chartwright-tmp',
      '/repo/mychart/values.yaml',
    )
    expect(rm).not.toHaveBeenCalled()
  })

  it('leaves every target untouched when a write fails', async () => {
    let { writeFile, rename, rm } = await import('node:fs/promises')
    vi.mocked(writeFile)
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new Error('disk full'))

    await expect(writeChartFiles(updates)).rejects.toThrowError('disk full')
    expect(rename).not.toHaveBeenCalled()
    expect(rm).toHaveBeenCalledWith('/repo/mychart/Chart.yaml.chartwright-tmp', {
      force: true,
    })
    expect(rm).toHaveBeenCalledWith(
      '/repo/mychart/values.yaml.chartwright-tmp',
      { force: true },
    )
  })

  it('does nothing without updates', async () => {
    let { writeFile, rename } = await import('node:fs/promises')
    await writeChartFiles([])
    expect(writeFile).not.toHaveBeenCalled()
    expect(rename).not.toHaveBeenCalled()
  })
})
