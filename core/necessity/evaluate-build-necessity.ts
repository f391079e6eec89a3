import type { NecessityInput } from '../../types/necessity-input'
import type { BuildDecision } from '../../types/build-decision'

import { requiredPlatforms } from './required-platforms'
import { missingPlatforms } from './missing-platforms'

/**
 * Decide whether an image must be built and pushed.
 *
 * The decision depends only on the input: the resolved tag's local and remote
 * existence, the platforms still required after skips, and the force flags.
 *
 * @param input - Snapshot, platforms and flags.
 * @returns Decision with the reasons that led to it.
 */
export function evaluateBuildNecessity(input: NecessityInput): BuildDecision {
  let reasons: string[] = []
  let { requestedPlatforms, snapshot } = input
  let required = requiredPlatforms(requestedPlatforms, input.skipPlatforms)

  if (requestedPlatforms.length > 0 && required.length === 0) {
    reasons.push('all requested platforms are skipped for this image')
    return { needsBuild: false, needsPush: false, reasons }
  }

  if (input.skipBuild) {
    reasons.push('build skipped by request')
    return { needsBuild: false, needsPush: false, reasons }
  }

  let isMultiPlatform = required.length > 1
  let missing = snapshot.remote
    ? missingPlatforms(snapshot.remote, required)
    : required
  let remoteComplete = snapshot.remote !== null && missing.length === 0

  let needsBuild: boolean
  if (input.forceBuild) {
    needsBuild = true
    reasons.push('build forced')
  } else if (!isMultiPlatform && snapshot.local) {
    needsBuild = false
    reasons.push('tag exists locally')
  } else if (remoteComplete) {
    needsBuild = false
    reasons.push(
      required.length > 0
        ? 'tag exists remotely for all required platforms'
        : 'tag exists remotely',
    )
  } else if (snapshot.remote) {
    needsBuild = true
    reasons.push(`tag exists remotely without ${missing.join(', ')}`)
  } else {
    needsBuild = true
    reasons.push(
      isMultiPlatform
        ? 'tag not found remotely'
        : 'tag not found locally or remotely',
    )
  }

  let needsPush: boolean
  if (!input.push) {
    needsPush = false
    reasons.push('push not requested')
  } else if (input.forcePush) {
    needsPush = true
    reasons.push('push forced')
  } else if (remoteComplete) {
    needsPush = false
    reasons.push('push skipped, tag already on registry')
  } else {
    needsPush = true
    reasons.push('tag missing from registry')
  }

  return { needsBuild, needsPush, reasons }
}
