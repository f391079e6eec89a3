/** Per-image settings of a chart in `chartwright.yaml`. */
export interface ImageConfig {
  /** Values paths receiving repository and tag (e.g. `image`). */
  valuesPath?: string[] | string

  /** Platforms never built for this image. */
  skipPlatforms?: string[]

  /** Dockerfile path, defaults to `<contextPath>/Dockerfile`. */
  dockerfilePath?: string

  /** Build context, defaults to `images/<key>`. */
  contextPath?: string

  /** Full image name replacing `imagePrefix` + key. */
  imageName?: string

  /** Extra paths whose changes affect the image. */
  paths?: string[]
}
