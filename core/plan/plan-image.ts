import type { PlanDependencies } from '../../types/plan-dependencies'
import type { ImageConfig } from '../../types/image-config'
import type { ChartConfig } from '../../types/chart-config'
import type { PlanOptions } from '../../types/plan-options'
import type { ImagePlan } from '../../types/image-plan'

import { evaluateBuildNecessity } from '../necessity/evaluate-build-necessity'
import { buildValueModifications } from '../values/build-value-modifications'
import { takeArtifactSnapshot } from '../necessity/take-artifact-snapshot'
import { requiredPlatforms } from '../necessity/required-platforms'
import { resolveArtifactVersion } from './resolve-artifact-version'
import { imagePathSet } from '../changes/image-path-set'

/** Image tag written by `--reset` when the chart sets none. */
export const DEFAULT_RESET_TAG = 'set-by-chartwright'

/**
 * Resolve the tag of one image and decide whether it needs building and
 * pushing.
 *
 * @param chart - Chart the image belongs to.
 * @param key - Image key.
 * @param image - Image settings.
 * @param options - Run options.
 * @param dependencies - Run collaborators.
 * @returns Image plan and warnings from version resolution.
 */
export async function planImage(
  chart: ChartConfig,
  key: string,
  image: ImageConfig,
  options: PlanOptions,
  dependencies: PlanDependencies,
): Promise<{ warnings: string[]; plan: ImagePlan }> {
  let { registry, history, cache } = dependencies
  let name =
    image.imageName ?? `${options.imagePrefix ?? chart.imagePrefix ?? ''}${key}`
  let requested = options.platforms ?? []
  let platforms = requiredPlatforms(requested, image.skipPlatforms)

  if (options.reset) {
    let tag = chart.resetTag ?? DEFAULT_RESET_TAG
    return {
      plan: {
        modifications: buildValueModifications(image, name, tag),
        reference: `${name}:${tag}`,
        decision: null,
        commit: null,
        platforms,
        name,
        tag,
        key,
      },
      warnings: [],
    }
  }

  let { warnings, version, point } = resolveArtifactVersion(
    history,
    imagePathSet(key, image),
    {
      baseVersion: chart.baseVersion,
      override: options.tag,
      long: options.long,
      cache,
    },
  )
  let reference = `${name}:${version}`

  let allSkipped = requested.length > 0 && platforms.length === 0
  let snapshot =
    options.skipBuild || allSkipped
      ? { remote: null, local: false }
      : await takeArtifactSnapshot(registry, reference, {
          multiPlatform: platforms.length > 1,
          push: options.push ?? false,
          cache,
        })

  let decision = evaluateBuildNecessity({
    skipPlatforms: image.skipPlatforms,
    requestedPlatforms: requested,
    forceBuild: options.forceBuild,
    forcePush: options.forcePush,
    skipBuild: options.skipBuild,
    push: options.push,
    snapshot,
  })

  return {
    plan: {
      modifications: buildValueModifications(image, name, version),
      commit: point?.commit ?? null,
      tag: version,
      reference,
      platforms,
      decision,
      name,
      key,
    },
    warnings,
  }
}
