import { execFileSync } from 'node:child_process'

import type { RegistryClientContext } from '../../types/registry-client-context'

import { readErrorProperty } from '../utils/read-error-property'
import { RegistryError } from '../errors/registry-error'

/**
 * Check whether the local container engine has an image for `name:tag`.
 *
 * @param context - Registry client context.
 * @param reference - Image reference.
 * @returns True when `docker image inspect` finds the image.
 * @throws {RegistryError} When docker is missing or the daemon fails.
 */
export function hasLocalImage(
  context: RegistryClientContext,
  reference: string,
): boolean {
  try {
    execFileSync(
      'docker',
      ['image', 'inspect', '--format', '{{.Id}}', reference],
      { stdio: ['ignore', 'pipe', 'pipe'], encoding: 'utf8', cwd: context.cwd },
    )
    return true
  } catch (error) {
    if (readErrorProperty(error, 'code') === 'ENOENT') {
      throw new RegistryError('docker executable not found in PATH')
    }

    let stderr = readErrorProperty(error, 'stderr')
    let detail = typeof stderr === 'string' ? stderr.trim() : ''
    if (/no such (?:image|object)/iu.test(detail)) {
      return false
    }
    throw new RegistryError(
      `docker image inspect ${reference} failed${detail ? `: ${detail}` : ''}`,
    )
  }
}
