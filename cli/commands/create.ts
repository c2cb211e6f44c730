import { Command } from 'commander'
import { START_MODES, isStartMode, type StartMode } from '../../types'
import { parsePort } from '../../core/port-manager'
import { usageError } from '../../core/error-handler'
import {
  collect,
  exitWithError,
  getServices,
  localeFromOptions,
  resolveOwner,
  withLocaleOptions,
  type LocaleOptions,
} from '../helpers'
import { ProgressTracker } from '../ui/spinner'
import { clusterBox } from '../ui/theme'

type CreateCommandOptions = LocaleOptions & {
  user?: string
  group?: string
  datadir?: string
  socketdir?: string
  logfile?: string
  port?: number
  startConf?: string
  pgoption: string[]
  createclusterconf?: string
  waldir?: string
  pgctlOptions?: string
  dataChecksums?: boolean
  start?: boolean
  json?: boolean
}

export const createCommand = withLocaleOptions(
  new Command('create')
    .description('Create a new PostgreSQL cluster')
    .argument('<version>', 'PostgreSQL major version')
    .argument('<name>', 'Cluster name')
    .argument('[initdb-options...]', 'Extra initdb options, after --')
    .option('-u, --user <user>', 'Cluster owner')
    .option('-g, --group <group>', 'Group for the cluster files')
    .option('-d, --datadir <path>', 'Data directory')
    .option('-s, --socketdir <path>', 'Unix socket directory')
    .option('-l, --logfile <path>', 'Server log file')
    .option('-p, --port <port>', 'Port (default: next free port)', parsePort)
    .option('--start-conf <mode>', `Startup mode: ${START_MODES.join(', ')}`)
    .option('-o, --pgoption <name=value>', 'Configuration setting (repeatable)', collect, [])
    .option('--createclusterconf <path>', 'Alternative createcluster.conf')
    .option('--waldir <path>', 'Directory for write-ahead log')
    .option('--pgctl-options <options>', 'Options written to pg_ctl.conf')
    .option('--data-checksums', 'Enable data page checksums')
    .option('--no-data-checksums', 'Disable data page checksums')
    .option('--start', 'Start the cluster after creating it')
    .option('-j, --json', 'Output result as JSON'),
).action(
  async (
    version: string,
    name: string,
    initdbOptions: string[],
    options: CreateCommandOptions,
  ) => {
    try {
      const { ctx, creator } = getServices()
      let start: StartMode | undefined
      if (options.startConf !== undefined) {
        if (!isStartMode(options.startConf)) {
          throw usageError(
            `invalid start mode "${options.startConf}"`,
            `Use one of ${START_MODES.join(', ')}`,
          )
        }
        start = options.startConf
      }
      const owner = await resolveOwner(ctx, options.user, options.group)
      const progress = new ProgressTracker()

      const { info, adopted } = await creator
        .create({
          version,
          name,
          owner,
          dataDir: options.datadir,
          port: options.port,
          socketDir: options.socketdir,
          logFile: options.logfile,
          locale: localeFromOptions(options),
          start,
          config: options.pgoption,
          initdbOptions,
          walDir: options.waldir,
          createclusterConf: options.createclusterconf,
          dataChecksums: options.dataChecksums,
          pgCtlOptions: options.pgctlOptions,
          startAfter: options.start,
          onProgress: progress.onProgress,
        })
        .catch((error: unknown) => {
          progress.fail()
          throw error
        })
      progress.succeed()

      if (options.json) {
        console.log(
          JSON.stringify({
            version: info.version,
            name: info.name,
            port: info.port,
            dataDir: info.dataDir,
            logFile: info.logFile,
            running: info.running,
            adopted,
          }),
        )
        return
      }

      console.log()
      console.log(
        clusterBox(
          adopted
            ? `Cluster ${version}/${name} created from existing data`
            : `Cluster ${version}/${name} created`,
          info,
        ),
      )
      console.log()
    } catch (error) {
      exitWithError(error)
    }
  },
)
