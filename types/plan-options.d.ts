/** Run-wide switches, usually taken from the command line. */
export interface PlanOptions {
  /** Overwrite chart versions already in the chart index. */
  forcePublishChart?: boolean

  /** Evaluate publishing each chart into its chart repository. */
  publishChart?: boolean

  /** Platforms to build; empty for the engine default. */
  platforms?: string[]

  /** Replace every chart's `imagePrefix`. */
  imagePrefix?: string

  /** Build even when the tag exists. */
  forceBuild?: boolean

  /** Push even when the tag exists remotely. */
  forcePush?: boolean

  /** Do not build or push images, only resolve tags. */
  skipBuild?: boolean

  /** Explicit chart version and image tag. */
  tag?: string

  /** Append the build suffix even on tagged commits. */
  long?: boolean

  /** Push images after building. */
  push?: boolean

  /** Use the configured reset version and tag, skipping builds. */
  reset?: boolean
}
