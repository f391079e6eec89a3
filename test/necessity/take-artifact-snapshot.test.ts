import { describe, expect, it, vi } from 'vitest'

import type { RegistrySource } from '../../types/registry-source'

import { takeArtifactSnapshot } from '../../core/necessity/take-artifact-snapshot'
import { createResolutionCache } from '../../core/cache/create-resolution-cache'

function registry(local: boolean): RegistrySource {
  return {
    getManifest: vi.fn(() =>
      Promise.resolve({ platforms: ['linux/amd64'] }),
    ),
    hasLocalImage: vi.fn(() => local),
  }
}

describe('takeArtifactSnapshot', () => {
  it('skips the registry when a local image settles the build', async () => {
    let source = registry(true)
    await expect(
      takeArtifactSnapshot(source, 'app:1.0.0', { multiPlatform: false, push: false }),
    ).resolves.toEqual({ remote: null, local: true })
    expect(source.getManifest).not.toHaveBeenCalled()
  })

  it('queries the registry when pushing', async () => {
    let source = registry(true)
    let snapshot = await takeArtifactSnapshot(source, 'app:1.0.0', {
      multiPlatform: false,
      push: true,
    })
    expect(snapshot).toEqual({
      remote: { platforms: ['linux/amd64'] },
      local: true,
    })
  })

  it('does not consult the local engine for multi-platform builds', async () => {
    let source = registry(true)
    let snapshot = await takeArtifactSnapshot(source, 'app:1.0.0', {
      multiPlatform: true,
      push: false,
    })
    expect(snapshot.local).toBeFalsy()
    expect(source.hasLocalImage).not.toHaveBeenCalled()
  })

  it('memoizes queries in the run cache', async () => {
    let cache = createResolutionCache()
    let source = registry(false)
    let options = { multiPlatform: false, push: false, cache }

    await takeArtifactSnapshot(source, 'app:1.0.0', options)
    await takeArtifactSnapshot(source, 'app:1.0.0', options)
    expect(source.getManifest).toHaveBeenCalledOnce()
    expect(source.hasLocalImage).toHaveBeenCalledOnce()
  })
})
