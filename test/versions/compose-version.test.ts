import { describe, expect, it } from 'vitest'

import { composeVersion } from '../../core/versions/compose-version'

describe('composeVersion', () => {
  let hash = { abbreviatedHash: 'cafe123', hash: 'cafe1234' }

  it('returns the base unchanged at distance 0', () => {
    expect(composeVersion({ base: '2.0.0', distance: 0, long: false, hash })).toBe(
      '2.0.0',
    )
  })

  it('adds the dev marker to release bases', () => {
    expect(composeVersion({ base: '2.0.0', distance: 3, long: false, hash })).toBe(
      '2.0.0-0.dev.git.3.hcafe123',
    )
  })

  it('keeps an existing prerelease', () => {
    expect(
      composeVersion({ base: '2.0.0-rc.1', distance: 3, long: false, hash }),
    ).toBe('2.0.0-rc.1.git.3.hcafe123')
  })
})
