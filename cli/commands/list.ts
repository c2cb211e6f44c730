import { Command } from 'commander'
import chalk from 'chalk'
import type { ClusterInfo } from '../../types'
import type { AccountDatabase } from '../../core/platform-service'
import { exitWithError, getServices } from '../helpers'
import { statusBadge, table, uiInfo } from '../ui/theme'

async function ownerName(accounts: AccountDatabase, info: ClusterInfo): Promise<string> {
  if (info.ownerUid === null) return '<unknown>'
  const account = await accounts.userByUid(info.ownerUid)
  return account ? account.name : String(info.ownerUid)
}

export const listCommand = new Command('list')
  .alias('ls')
  .description('List all clusters')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    try {
      const { ctx, registry } = getServices()
      const clusters = await registry.listAll()

      if (options.json) {
        const rows = await Promise.all(
          clusters.map(async (info) => ({
            version: info.version,
            cluster: info.name,
            port: info.port,
            running: info.running,
            recovery: info.recovery,
            owner: await ownerName(ctx.host.accounts, info),
            dataDirectory: info.dataDir,
            logFile: info.logFile,
            start: info.start,
          })),
        )
        console.log(JSON.stringify(rows, null, 2))
        return
      }

      if (clusters.length === 0) {
        console.log(uiInfo('No clusters found. Create one with: pgcluster create <version> <name>'))
        return
      }

      const rows = [['Ver', 'Cluster', 'Port', 'Status', 'Owner', 'Data directory', 'Log file']]
      for (const info of clusters) {
        rows.push([
          chalk.yellow(info.version),
          chalk.cyan(info.name),
          chalk.green(String(info.port)),
          statusBadge(info),
          await ownerName(ctx.host.accounts, info),
          info.dataDir ?? chalk.gray('<unknown>'),
          chalk.gray(info.logFile),
        ])
      }

      console.log(table(rows))
    } catch (error) {
      exitWithError(error)
    }
  })
