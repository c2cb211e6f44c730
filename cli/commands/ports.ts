import { Command } from 'commander'
import chalk from 'chalk'
import { exitWithError, getServices } from '../helpers'
import { keyValue, table, theme } from '../ui/theme'

export const portsCommand = new Command('ports')
  .description('Show the ports claimed by clusters and the next free one')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    try {
      const { registry } = getServices()
      const claimed = [...(await registry.collectPorts())].sort(([a], [b]) => a - b)
      const next = await registry.nextFreePort()

      if (options.json) {
        console.log(
          JSON.stringify(
            {
              claimed: claimed.map(([port, cluster]) => ({ port, cluster })),
              next,
            },
            null,
            2,
          ),
        )
        return
      }

      if (claimed.length > 0) {
        const rows = [['Port', 'Cluster']]
        for (const [port, cluster] of claimed) {
          rows.push([chalk.green(String(port)), theme.clusterName(cluster)])
        }
        console.log(table(rows))
        console.log()
      }
      console.log(keyValue('Next free port', theme.port(String(next))))
    } catch (error) {
      exitWithError(error)
    }
  })
