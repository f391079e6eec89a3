export type { ChartwrightConfig } from '../types/chartwright-config'
export type { ChartFileUpdate } from '../types/chart-file-update'
export type { PublishDecision } from '../types/publish-decision'
export type { RegistrySource } from '../types/registry-source'
export type { ResolutionCache } from '../types/resolution-cache'
export type { HistorySource } from '../types/history-source'
export type { BuildDecision } from '../types/build-decision'
export type { ImageConfig } from '../types/image-config'
export type { ChartConfig } from '../types/chart-config'
export type { PlanOptions } from '../types/plan-options'
export type { VersionSpec } from '../types/version-spec'
export type { ChartPlan } from '../types/chart-plan'
export type { ImagePlan } from '../types/image-plan'
export type { Tag } from '../types/tag'

export { evaluateBuildNecessity } from './necessity/evaluate-build-necessity'
export { createChartIndexSource } from './publish/create-chart-index-source'
export { createResolutionCache } from './cache/create-resolution-cache'
export { createRegistryClient } from './registry/create-registry-client'
export { VersionFormatError } from './errors/version-format-error'
export { prepareChartFiles } from './values/prepare-chart-files'
export { distanceAndHash } from './history/distance-and-hash'
export { writeChartFiles } from './values/write-chart-files'
export { createGitHistory } from './git/create-git-history'
export { evaluatePublish } from './publish/evaluate-publish'
export { resolveVersion } from './versions/resolve-version'
export { loadConfig, CONFIG_FILE } from './config/load-config'
export { RegistryError } from './errors/registry-error'
export { ConfigError } from './errors/config-error'
export { latestTag } from './history/latest-tag'
export { planCharts } from './plan/plan-charts'
export { GitError } from './errors/git-error'
