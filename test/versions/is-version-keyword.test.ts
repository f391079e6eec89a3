import { describe, expect, it } from 'vitest'

import { isVersionKeyword } from '../../core/versions/is-version-keyword'

describe('isVersionKeyword', () => {
  it('accepts the increment keywords', () => {
    expect(isVersionKeyword('major')).toBeTruthy()
    expect(isVersionKeyword('minor')).toBeTruthy()
    expect(isVersionKeyword('patch')).toBeTruthy()
  })

  it('rejects other values', () => {
    expect(isVersionKeyword('1.0.0')).toBeFalsy()
    expect(isVersionKeyword('Minor')).toBeFalsy()
    expect(isVersionKeyword(null)).toBeFalsy()
    expect(isVersionKeyword(undefined)).toBeFalsy()
  })
})
