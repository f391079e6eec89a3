import type { PublishDecision } from './publish-decision'
import type { ChartArtifact } from './chart-artifact'
import type { ImagePlan } from './image-plan'

/** Everything resolved for one chart before any file is written. */
export interface ChartPlan extends ChartArtifact {
  /** Publish gate result, null when publishing was not requested. */
  publish: PublishDecision | null

  /** Non-fatal findings, such as a stale base version. */
  warnings: string[]

  images: ImagePlan[]
}
