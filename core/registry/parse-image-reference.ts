import type { ImageReference } from '../../types/image-reference'

import { ConfigError } from '../errors/config-error'

/** Registry used for references without an explicit host. */
export const DEFAULT_REGISTRY = 'docker.io'

/**
 * Split a `name:tag` reference into registry, repository and tag, following
 * the container engine rules: the first path component is a registry host
 * when it contains `.` or `:` or is `localhost`, and single-component Docker
 * Hub names live under `library/`.
 *
 * @param reference - Image reference such as `ghcr.io/org/app:1.0.0`.
 * @returns Parsed reference.
 * @throws {ConfigError} When the reference has no name or contains a digest.
 */
export function parseImageReference(reference: string): ImageReference {
  let trimmed = reference.trim()
  if (trimmed.includes('@')) {
    throw new ConfigError(
      `Image reference "${reference}" uses a digest; a tag is required`,
    )
  }

  let lastSlash = trimmed.lastIndexOf('/')
  let lastColon = trimmed.lastIndexOf(':')
  let name = trimmed
  let tag = 'latest'
  if (lastColon > lastSlash) {
    name = trimmed.slice(0, lastColon)
    tag = trimmed.slice(lastColon + 1)
  }

  if (!name || !tag) {
    throw new ConfigError(`Invalid image reference "${reference}"`)
  }

  let [first = '', ...rest] = name.split('/')
  let hasHost =
    rest.length > 0 &&
    (first.includes('.') || first.includes(':') || first === 'localhost')

  let registry = hasHost ? first : DEFAULT_REGISTRY
  let repository = hasHost ? rest.join('/') : name
  if (registry === DEFAULT_REGISTRY && !repository.includes('/')) {
    repository = `library/${repository}`
  }

  return { reference: trimmed, repository, registry, tag }
}
