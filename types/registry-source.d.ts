import type { RemoteManifest } from './remote-manifest'

/**
 * Existence queries against the local container engine and remote
 * registries. The only registry operations the resolver needs.
 */
export interface RegistrySource {
  /** Fetch the manifest for `name:tag`, null when the tag does not exist. */
  getManifest(reference: string): Promise<RemoteManifest | null>

  /** True when the local engine has an image for `name:tag`. */
  hasLocalImage(reference: string): boolean
}
