import type { RemoteManifest } from './remote-manifest'

/** Existence of an image reference in the local engine and the registry. */
export interface ArtifactSnapshot {
  /** Registry manifest for the tag, null when the tag is not published. */
  remote: RemoteManifest | null

  /** Image exists in the local container engine. */
  local: boolean
}
