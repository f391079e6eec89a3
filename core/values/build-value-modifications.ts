import type { ValueModification } from '../../types/value-modification'
import type { ImageConfig } from '../../types/image-config'

import { parseValuesPath } from './parse-values-path'

/**
 * List the values modifications of one image: its repository and tag at
 * every configured values path.
 *
 * @param image - Image settings.
 * @param repository - Full image name.
 * @param tag - Resolved tag.
 * @returns Modifications, empty when the image has no `valuesPath`.
 */
export function buildValueModifications(
  image: ImageConfig,
  repository: string,
  tag: string,
): ValueModification[] {
  let paths =
    typeof image.valuesPath === 'string'
      ? [image.valuesPath]
      : (image.valuesPath ?? [])

  return paths.map(source => ({
    path: parseValuesPath(source),
    repository,
    source,
    tag,
  }))
}
