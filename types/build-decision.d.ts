/** Outcome of the build/push necessity evaluation for one image. */
export interface BuildDecision {
  /** Human-readable justifications, in evaluation order. */
  reasons: string[]

  needsBuild: boolean

  needsPush: boolean
}
