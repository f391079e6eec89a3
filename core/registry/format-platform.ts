import { isRecord } from '../utils/is-record'

/**
 * Format a platform object from a manifest or image config as
 * `os/architecture[/variant]`.
 *
 * @param value - Object with `os`, `architecture` and optional `variant`.
 * @returns Platform string, or null when the object does not describe a
 *   runnable platform (attestation manifests use `unknown/unknown`).
 */
export function formatPlatform(value: unknown): string | null {
  if (!isRecord(value)) {
    return null
  }

  let { architecture, variant, os } = value
  if (typeof os !== 'string' || typeof architecture !== 'string') {
    return null
  }
  if (os === 'unknown' || architecture === 'unknown') {
    return null
  }

  let platform = `${os}/${architecture}`
  return typeof variant === 'string' && variant
    ? `${platform}/${variant}`
    : platform
}
