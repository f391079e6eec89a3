import type { ValueModification } from './value-modification'
import type { BuildDecision } from './build-decision'
import type { ImageArtifact } from './image-artifact'
import type { CommitRef } from './commit-ref'

/** Resolved tag and decisions for one image of a chart. */
export interface ImagePlan extends ImageArtifact {
  /** Values entries receiving this image. */
  modifications: ValueModification[]

  /** Build/push decision, null in reset mode. */
  decision: BuildDecision | null

  /** Commit the tag was computed for, null for explicit tags. */
  commit: CommitRef | null

  /** `name:tag`. */
  reference: string

  /** Image key in the chart config. */
  key: string
}
