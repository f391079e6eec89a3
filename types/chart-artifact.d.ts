/** A chart version to publish into a chart repository. */
export interface ChartArtifact {
  chartName: string

  version: string
}
