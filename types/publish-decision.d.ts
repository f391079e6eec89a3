/** Outcome of the chart publish gate. */
export interface PublishDecision {
  /** True when an existing index entry would be replaced. */
  overwrite: boolean

  needsPublish: boolean

  reason: string
}
