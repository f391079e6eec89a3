import type { Document } from 'yaml'

import { isScalar, isMap } from 'yaml'

import { ConfigError } from '../errors/config-error'

/**
 * Set the `version` of a parsed `Chart.yaml`.
 *
 * @param document - Parsed chart document.
 * @param version - Resolved chart version.
 * @returns True when the version changed.
 * @throws {ConfigError} When the document is not a mapping.
 */
export function setChartVersion(document: Document, version: string): boolean {
  let { contents } = document
  if (!isMap(contents)) {
    throw new ConfigError('Chart.yaml must be a mapping')
  }

  let current = contents.get('version', true)
  if (isScalar(current) && String(current.value) === version) {
    return false
  }
  contents.set('version', version)
  return true
}
