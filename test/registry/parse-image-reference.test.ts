import { describe, expect, it } from 'vitest'

import { parseImageReference } from '../../core/registry/parse-image-reference'
import { ConfigError } from '../../core/errors/config-error'

describe('parseImageReference', () => {
  it('places single names under library on Docker Hub', () => {
    expect(parseImageReference('nginx:1.27')).toEqual({
      repository: 'library/nginx',
      reference: 'nginx:1.27',
      registry: 'docker.io',
      tag: '1.27',
    })
  })

  it('detects registry hosts', () => {
    expect(parseImageReference('ghcr.io/org/app:1.0.0')).toMatchObject({
      repository: 'org/app',
      registry: 'ghcr.io',
      tag: '1.0.0',
    })
    expect(parseImageReference('localhost:5000/app:dev')).toMatchObject({
      registry: 'localhost:5000',
      repository: 'app',
      tag: 'dev',
    })
  })

  it('keeps Docker Hub organisations', () => {
    expect(parseImageReference('org/app')).toMatchObject({
      registry: 'docker.io',
      repository: 'org/app',
      tag: 'latest',
    })
  })

  it('rejects digests', () => {
    expect(() => parseImageReference('app@sha256:abc')).toThrowError(
      ConfigError,
    )
  })

  it('rejects empty tags', () => {
    expect(() => parseImageReference('app:')).toThrowError(
      'Invalid image reference "app:"',
    )
  })
})
