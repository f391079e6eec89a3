import type { ImageConfig } from '../../types/image-config'
import type { PathSet } from '../../types/path-set'

import { createPathSet } from './create-path-set'

/**
 * Resolve the build context of an image.
 *
 * @param key - Image key in the chart config.
 * @param image - Image settings.
 * @returns Context path, `images/<key>` by default.
 */
export function getContextPath(key: string, image: ImageConfig): string {
  return image.contextPath ?? `images/${key}`
}

/**
 * Resolve the Dockerfile of an image.
 *
 * @param key - Image key in the chart config.
 * @param image - Image settings.
 * @returns Dockerfile path, `<contextPath>/Dockerfile` by default.
 */
export function getDockerfilePath(key: string, image: ImageConfig): string {
  return image.dockerfilePath ?? `${getContextPath(key, image)}/Dockerfile`
}

/**
 * Paths whose changes affect an image tag: the build context, the Dockerfile
 * and any extra configured paths.
 *
 * @param key - Image key in the chart config.
 * @param image - Image settings.
 * @returns Path set of the image.
 */
export function imagePathSet(key: string, image: ImageConfig): PathSet {
  return createPathSet(
    getContextPath(key, image),
    getDockerfilePath(key, image),
    image.paths ?? [],
  )
}
