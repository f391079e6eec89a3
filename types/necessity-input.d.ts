import type { ArtifactSnapshot } from './artifact-snapshot'

/** Everything the necessity evaluation of one image depends on. */
export interface NecessityInput {
  /** Platforms requested for the run; empty for the engine default. */
  requestedPlatforms: readonly string[]

  /** Platforms the image is configured to skip. */
  skipPlatforms?: readonly string[]

  /** Local and remote existence of `reference`. */
  snapshot: ArtifactSnapshot

  /** Build even when the tag exists. */
  forceBuild?: boolean

  /** Push even when the tag exists remotely. */
  forcePush?: boolean

  /** Skip building (and therefore pushing) entirely. */
  skipBuild?: boolean

  /** Push was requested. */
  push?: boolean
}
