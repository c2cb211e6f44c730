import { Command } from 'commander'
import { parsePort } from '../../core/port-manager'
import { exitWithError, getServices, resolveOwner } from '../helpers'
import { ProgressTracker } from '../ui/spinner'
import { clusterBox } from '../ui/theme'

type RestoreCommandOptions = {
  user?: string
  group?: string
  port?: number
  datadir?: string
  start?: boolean
  archive?: boolean
  pitr?: string
  walArchive?: string
}

export const restoreCommand = new Command('restore')
  .description('Create a cluster from a dump or base backup')
  .argument('<backup>', 'Backup directory (<version>-<cluster>/<timestamp>.dump or .backup)')
  .argument('[version]', 'Version of the restored cluster (default: the backup\'s)')
  .argument('[name]', 'Name of the restored cluster (default: the backup\'s)')
  .option('-u, --user <user>', 'Cluster owner')
  .option('-g, --group <group>', 'Group for the cluster files')
  .option('-p, --port <port>', 'Port (default: next free port)', parsePort)
  .option('-d, --datadir <path>', 'Data directory')
  .option('--start', 'Start the cluster after restoring it')
  .option('--archive', 'Replay WAL from the archive (base backups)')
  .option('--pitr <timestamp>', 'Recover up to this time (base backups)')
  .option('--wal-archive <path>', 'WAL archive other than the backup\'s wal/ directory')
  .action(
    async (
      backup: string,
      version: string | undefined,
      name: string | undefined,
      options: RestoreCommandOptions,
    ) => {
      try {
        const { ctx, restores } = getServices()
        const owner = await resolveOwner(ctx, options.user, options.group)
        const progress = new ProgressTracker()

        const { info, kind } = await restores
          .restore({
            backup,
            owner,
            version,
            name,
            port: options.port,
            dataDir: options.datadir,
            start: options.start,
            archive: options.archive,
            recoveryTargetTime: options.pitr,
            walArchive: options.walArchive,
            onProgress: progress.onProgress,
          })
          .catch((error: unknown) => {
            progress.fail()
            throw error
          })
        progress.succeed()

        console.log()
        console.log(
          clusterBox(
            `Cluster ${info.version}/${info.name} restored from ${kind === 'dump' ? 'dump' : 'base backup'}`,
            info,
          ),
        )
        console.log()
      } catch (error) {
        exitWithError(error)
      }
    },
  )
