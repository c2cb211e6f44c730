import { Command, Option } from 'commander'
import { UPGRADE_METHODS, type UpgradeMethod } from '../../types'
import { parsePort } from '../../core/port-manager'
import {
  exitWithError,
  getServices,
  localeFromOptions,
  parseCount,
  withLocaleOptions,
  type LocaleOptions,
} from '../helpers'
import { ProgressTracker } from '../ui/spinner'
import { clusterBox, theme, uiInfo } from '../ui/theme'

type UpgradeCommandOptions = LocaleOptions & {
  newVersion?: string
  rename?: string
  method: string
  port?: number
  jobs?: number
  keepPort?: boolean
  start: boolean
  keepOnError?: boolean
  oldBindir?: string
}

function isUpgradeMethod(value: string): value is UpgradeMethod {
  return (UPGRADE_METHODS as readonly string[]).includes(value)
}

export const upgradeCommand = withLocaleOptions(
  new Command('upgrade')
    .description('Upgrade a cluster to a newer major version')
    .argument('<version>', 'Current PostgreSQL major version')
    .argument('<name>', 'Cluster name')
    .option('--new-version <version>', 'Target version (default: newest installed)')
    .option('--rename <name>', 'Name of the upgraded cluster')
    .addOption(
      new Option('-m, --method <method>', 'Upgrade method').choices(UPGRADE_METHODS).default('dump'),
    )
    .option('-p, --port <port>', 'Port for the new cluster; keeps the old one on its port', parsePort)
    .option('-j, --jobs <n>', 'Parallel jobs for pg_upgrade', parseCount)
    .option('-k, --keep-port', 'Do not swap ports between the old and new cluster')
    .option('--no-start', 'Do not start the new cluster')
    .option('--keep-on-error', 'Leave the new cluster in place when the upgrade fails')
    .option('--old-bindir <path>', 'Binaries of the old version, for pg_upgrade'),
).action(async (version: string, name: string, options: UpgradeCommandOptions) => {
  try {
    const { upgrader } = getServices()
    const progress = new ProgressTracker()

    const result = await upgrader
      .upgrade({
        version,
        name,
        newVersion: options.newVersion,
        newName: options.rename,
        method: isUpgradeMethod(options.method) ? options.method : 'dump',
        port: options.port,
        jobs: options.jobs,
        keepPort: options.keepPort,
        noStart: !options.start,
        keepOnError: options.keepOnError,
        oldBindir: options.oldBindir,
        locale: localeFromOptions(options),
        onProgress: progress.onProgress,
      })
      .catch((error: unknown) => {
        progress.fail()
        throw error
      })
    progress.succeed()

    for (const line of result.appliedRules) {
      console.log(uiInfo(`postgresql.conf: ${line}`))
    }
    console.log()
    console.log(
      clusterBox(
        `Cluster ${version}/${name} upgraded to ${result.target.version}/${result.target.name}`,
        result.target,
      ),
    )
    console.log()
    console.log(
      theme.dim(
        `  The old cluster ${version}/${name} is kept on port ${result.source.port} with manual startup.`,
      ),
    )
    console.log(theme.dim(`  Remove it with: pgcluster drop ${version} ${name}`))
    console.log()
  } catch (error) {
    exitWithError(error)
  }
})
