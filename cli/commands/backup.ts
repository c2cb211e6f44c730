import { Command } from 'commander'
import chalk from 'chalk'
import { BACKUP_ACTIONS, isBackupAction, type BackupAction } from '../../core/backup-manager'
import { usageError } from '../../core/error-handler'
import type { BackupKind, ClusterInfo } from '../../types'
import { describeCluster, exitWithError, getServices, parseCount, type Services } from '../helpers'
import { withSpinner } from '../ui/spinner'
import { table, uiInfo, uiSuccess, uiWarning } from '../ui/theme'

function statusColor(status: string): string {
  switch (status) {
    case 'ok':
      return chalk.green(status)
    case 'failed':
      return chalk.red(status)
    default:
      return chalk.yellow(status)
  }
}

async function listBackups(services: Services, info: ClusterInfo): Promise<void> {
  const backups = await services.backups.list(info)
  if (backups.length === 0) {
    console.log(uiInfo(`No backups of ${info.version}/${info.name} in ${services.backups.backupDir(info)}`))
    return
  }
  const rows = [['Backup', 'Type', 'Status', 'Duration']]
  for (const entry of backups) {
    rows.push([
      entry.path,
      entry.kind,
      entry.status ? statusColor(entry.status.status) : chalk.gray('<no status>'),
      entry.status?.duration ?? '',
    ])
  }
  console.log(table(rows))
}

async function expire(
  services: Services,
  info: ClusterInfo,
  kind: BackupKind,
  count: string | undefined,
): Promise<void> {
  if (count === undefined) {
    throw usageError(`expire${kind === 'dump' ? 'dumps' : 'basebackups'} needs the number of backups to keep`)
  }
  const removed = await services.backups.expire(info, kind, parseCount(count))
  for (const path of removed) console.log(`Removed ${path}`)
}

async function runAction(
  services: Services,
  info: ClusterInfo,
  action: BackupAction,
  count: string | undefined,
): Promise<void> {
  const { backups } = services
  const cluster = `${info.version}/${info.name}`
  switch (action) {
    case 'createdirectory':
      console.log(uiSuccess(`Backup directory ${await backups.createDirectory(info)}`))
      return
    case 'dump': {
      const dir = await withSpinner(`Dumping ${cluster}...`, () => backups.dump(info))
      console.log(uiSuccess(`Dump written to ${dir}`))
      return
    }
    case 'basebackup': {
      const dir = await withSpinner(`Taking base backup of ${cluster}...`, () =>
        backups.basebackup(info),
      )
      console.log(uiSuccess(`Base backup written to ${dir}`))
      return
    }
    case 'expiredumps':
      return expire(services, info, 'dump', count)
    case 'expirebasebackups':
      return expire(services, info, 'backup', count)
    case 'receivewal':
      console.log(uiInfo(`Receiving WAL into ${backups.walDir(info)}, stop with Ctrl-C`))
      await backups.receiveWal(info)
      return
    case 'compresswal': {
      const compressed = await backups.compressWal(info)
      console.log(uiSuccess(`Compressed ${compressed} WAL segment(s)`))
      return
    }
    case 'archivecleanup': {
      const segment = await backups.archiveCleanup(info)
      if (segment) console.log(uiSuccess(`Removed WAL older than ${segment}`))
      return
    }
    case 'list':
      return listBackups(services, info)
  }
}

export const backupCommand = new Command('backup')
  .description('Back up a cluster and manage its backups')
  .argument('<version>', 'PostgreSQL major version')
  .argument('<name>', 'Cluster name')
  .argument('<action>', `One of: ${BACKUP_ACTIONS.join(', ')}`)
  .argument('[count]', 'Number of backups to keep, for the expire actions')
  .action(async (version: string, name: string, action: string, count: string | undefined) => {
    try {
      if (!isBackupAction(action)) {
        throw usageError(`unknown backup action "${action}"`, `Use one of ${BACKUP_ACTIONS.join(', ')}`)
      }
      const services = getServices()
      const info = await describeCluster(services.registry, { version, name })
      if (action !== 'list' && info.recovery) {
        console.log(uiWarning(`Cluster ${version}/${name} is in recovery`))
      }
      await runAction(services, info, action, count)
    } catch (error) {
      exitWithError(error)
    }
  })
