import { describe, expect, it } from 'vitest'

import { requiredPlatforms } from '../../core/necessity/required-platforms'
import { normalizePlatform } from '../../core/necessity/normalize-platform'
import { missingPlatforms } from '../../core/necessity/missing-platforms'

describe('normalizePlatform', () => {
  it('prefixes bare architectures with linux', () => {
    expect(normalizePlatform(' AMD64 ')).toBe('linux/amd64')
    expect(normalizePlatform('windows/amd64')).toBe('windows/amd64')
  })
})

describe('requiredPlatforms', () => {
  it('removes skipped platforms and duplicates', () => {
    expect(
      requiredPlatforms(['amd64', 'linux/amd64', 'arm64', 'ppc64le'], ['arm64']),
    ).toEqual(['linux/amd64', 'linux/ppc64le'])
  })
})

describe('missingPlatforms', () => {
  it('lists platforms absent from the manifest', () => {
    expect(
      missingPlatforms(
        { platforms: ['linux/amd64', 'linux/arm/v7'] },
        ['linux/amd64', 'linux/arm', 'linux/arm64'],
      ),
    ).toEqual(['linux/arm64'])
  })
})
