import type { ImageConfig } from '../../../types/image-config'

import { isRecord } from '../../utils/is-record'
import { isStringList } from './is-string-list'

/** Optional string settings of an image. */
const STRING_KEYS = ['imageName', 'contextPath', 'dockerfilePath'] as const

/** Optional string list settings of an image. */
const LIST_KEYS = ['paths', 'skipPlatforms'] as const

/**
 * Type guard to check if a value conforms to the ImageConfig interface.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid image definition.
 */
export function isImageConfig(value: unknown): value is ImageConfig {
  if (!isRecord(value)) {
    return false
  }

  for (let key of STRING_KEYS) {
    if (value[key] !== undefined && typeof value[key] !== 'string') {
      return false
    }
  }

  for (let key of LIST_KEYS) {
    if (value[key] !== undefined && !isStringList(value[key])) {
      return false
    }
  }

  let { valuesPath } = value
  return (
    valuesPath === undefined ||
    typeof valuesPath === 'string' ||
    isStringList(valuesPath)
  )
}
