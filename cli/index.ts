import { createSpinner } from 'nanospinner'
import pc from 'picocolors'
import cac from 'cac'

import {
  createChartIndexSource,
  createResolutionCache,
  createRegistryClient,
  prepareChartFiles,
  createGitHistory,
  writeChartFiles,
  RegistryError,
  CONFIG_FILE,
  planCharts,
  loadConfig,
  GitError,
} from '../core/index'
import { normalizeListOption } from './normalize-list-option'
import { printFileUpdates } from './print-file-updates'
import { printImageList } from './print-image-list'
import { readRawOption } from './read-raw-option'
import { version } from '../package.json'
import { printPlan } from './print-plan'

/** CLI Options. */
interface CLIOptions {
  /** Overwrite chart versions already published. */
  forcePublishChart?: boolean

  /** Evaluate publishing the charts. */
  publishChart?: boolean

  /** Print `name:tag` per image and change nothing. */
  listImages?: boolean

  /** Build even when the tag exists. */
  forceBuild?: boolean

  /** Push even when the tag exists remotely. */
  forcePush?: boolean

  /** Resolve tags without build evaluation. */
  skipBuild?: boolean

  /** Configuration file. */
  config: string

  /** Append the build suffix on tagged commits. */
  long?: boolean

  /** Push images after building. */
  push?: boolean

  /** Write reset versions and tags. */
  reset?: boolean
}

/**
 * Print a follow-up line for errors with a known remedy.
 *
 * @param error - Caught error.
 */
function printErrorHint(error: unknown): void {
  if (error instanceof GitError) {
    console.error(
      pc.gray('\nRun chartwright inside a git working copy with at least one commit'),
    )
  } else if (error instanceof RegistryError) {
    console.error(
      pc.gray('\nCheck registry credentials in $DOCKER_CONFIG or ~/.docker/config.json'),
    )
  }
}

/** Run the CLI. */
export function run(): void {
  let cli = cac('chartwright')

  cli
    .help()
    .version(version)
    .option('--config <file>', `Configuration file (default: ${CONFIG_FILE})`, {
      default: CONFIG_FILE,
    })
    .option('--tag <tag>', 'Use this chart version and image tag')
    .option('--long', 'Append the commit suffix even on tagged commits')
    .option('--push', 'Push images after building')
    .option('--force-build', 'Build images even if the tag exists')
    .option('--force-push', 'Push images even if the tag exists remotely')
    .option('--publish-chart', 'Publish charts into their chart repository')
    .option(
      '--force-publish-chart',
      'Overwrite chart versions that are already published',
    )
    .option('--platform <platform>', 'Target platform (repeatable)')
    .option('--image-prefix <prefix>', 'Override the image prefix of every chart')
    .option('--skip-build', 'Only resolve tags and update chart files')
    .option('--reset', 'Write the reset version and tag')
    .option('--list-images', 'Print image references and change nothing')
    .command('', 'Resolve chart versions and image tags from git history')
    .action(async (options: CLIOptions) => {
      let cwd = process.cwd()
      let spinner = createSpinner('Loading configuration...').start()

      try {
        let config = await loadConfig(cwd, options.config)
        spinner.success(
          `Loaded ${pc.yellow(config.charts.length)} charts from ${options.config}`,
        )

        spinner = createSpinner('Resolving versions...').start()
        let imagePrefix = readRawOption(cli.rawArgs, '--image-prefix').at(-1)
        let platforms = readRawOption(cli.rawArgs, '--platform')
        let tag = readRawOption(cli.rawArgs, '--tag').at(-1)
        let plans = await planCharts(
          config,
          {
            skipBuild: options.skipBuild || options.listImages,
            platforms: normalizeListOption(platforms),
            imagePrefix,
            tag,
            forcePublishChart: options.forcePublishChart,
            publishChart: options.publishChart,
            forceBuild: options.forceBuild,
            forcePush: options.forcePush,
            reset: options.reset,
            long: options.long,
            push: options.push,
          },
          {
            registry: createRegistryClient({ cwd }),
            chartIndex: createChartIndexSource(),
            cache: createResolutionCache(),
            history: createGitHistory(cwd),
          },
        )
        spinner.success('Resolved versions')

        if (options.listImages) {
          printImageList(plans)
          return
        }

        printPlan(plans)

        let updates = await prepareChartFiles(cwd, plans)
        await writeChartFiles(updates)
        printFileUpdates(cwd, updates)
      } catch (error) {
        spinner.error('Failed')
        console.error(
          pc.redBright('\nError:'),
          error instanceof Error ? error.message : String(error),
        )
        printErrorHint(error)
        process.exit(1)
      }
    })

  cli.parse()
}
