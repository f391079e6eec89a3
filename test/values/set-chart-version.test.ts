import { describe, expect, it } from 'vitest'
import { parseDocument } from 'yaml'

import { setChartVersion } from '../../core/values/set-chart-version'
import { ConfigError } from '../../core/errors/config-error'

describe('setChartVersion', () => {
  it('replaces the version and keeps the rest', () => {
    let document = parseDocument(
      'apiVersion: v2\nname: mychart\nversion: 0.0.1\n',
    )
    expect(setChartVersion(document, '1.2.3-0.dev.git.4.habc1234')).toBeTruthy()
    expect(document.toString()).toBe(
      'apiVersion: v2\nname: mychart\nversion: 1.2.3-0.dev.git.4.habc1234\n',
    )
  })

  it('reports unchanged versions', () => {
    let document = parseDocument('name: mychart\nversion: 1.0.0\n')
    expect(setChartVersion(document, '1.0.0')).toBeFalsy()
  })

  it('rejects documents that are not mappings', () => {
    expect(() => setChartVersion(parseDocument('- a\n'), '1.0.0')).toThrowError(
      ConfigError,
    )
  })
})
