import type { RegistryClientContext } from '../../types/registry-client-context'
import type { RemoteManifest } from '../../types/remote-manifest'

import { makeRegistryRequest } from './make-registry-request'
import { parseImageReference } from './parse-image-reference'
import { RegistryError } from '../errors/registry-error'
import { formatPlatform } from './format-platform'
import { isRecord } from '../utils/is-record'

/** Manifest and index media types accepted from registries. */
export const MANIFEST_MEDIA_TYPES = [
  'application/vnd.oci.image.index.v1+json',
  'application/vnd.docker.distribution.manifest.list.v2+json',
  'application/vnd.oci.image.manifest.v1+json',
  'application/vnd.docker.distribution.manifest.v2+json',
]

/**
 * Fetch the manifest of `name:tag` and list the platforms it provides.
 *
 * Image indexes list their platforms directly. For a single-image manifest
 * the platform is read from its config blob.
 *
 * @param context - Registry client context.
 * @param reference - Image reference.
 * @returns Manifest summary, or null when the tag does not exist.
 * @throws {RegistryError} When the registry cannot be queried.
 */
export async function getManifest(
  context: RegistryClientContext,
  reference: string,
): Promise<RemoteManifest | null> {
  let image = parseImageReference(reference)
  let response = await makeRegistryRequest(context, {
    path: `/v2/${image.repository}/manifests/${image.tag}`,
    repository: image.repository,
    accept: MANIFEST_MEDIA_TYPES,
    registry: image.registry,
  })
  if (!response) {
    return null
  }

  let payload = await readJson(response, image.reference)

  let manifests = payload['manifests']
  if (Array.isArray(manifests)) {
    let platforms = manifests
      .map((entry: unknown) =>
        isRecord(entry) ? formatPlatform(entry['platform']) : null,
      )
      .filter((platform): platform is string => platform !== null)
    return { platforms: [...new Set(platforms)] }
  }

  let config = payload['config']
  let configDigest = isRecord(config) ? config['digest'] : null
  if (typeof configDigest !== 'string') {
    return { platforms: [] }
  }

  let blob = await makeRegistryRequest(context, {
    path: `/v2/${image.repository}/blobs/${configDigest}`,
    repository: image.repository,
    registry: image.registry,
  })
  if (!blob) {
    throw new RegistryError(
      `Config blob ${configDigest} of ${image.reference} is missing`,
      404,
    )
  }

  let platform = formatPlatform(await readJson(blob, image.reference))
  return { platforms: platform ? [platform] : [] }
}

/**
 * Parse a JSON object body.
 *
 * @param response - Registry response.
 * @param reference - Image reference, for messages.
 * @returns Parsed object.
 */
async function readJson(
  response: Response,
  reference: string,
): Promise<Record<string, unknown>> {
  let data: unknown
  try {
    data = await response.json()
  } catch {
    throw new RegistryError(`Registry returned invalid JSON for ${reference}`)
  }
  if (!isRecord(data)) {
    throw new RegistryError(
      `Registry returned an unexpected payload for ${reference}`,
    )
  }
  return data
}
