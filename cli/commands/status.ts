import { Command } from 'commander'
import { describeCluster, exitWithError, getServices, resolveCluster } from '../helpers'
import { keyValue, statusBadge, theme, uiWarning } from '../ui/theme'

// pg_ctl status exits 3 when the server is down
const EXIT_NOT_RUNNING = 3

export const statusCommand = new Command('status')
  .description('Show whether a cluster is running')
  .argument('[version]', 'PostgreSQL major version')
  .argument('[name]', 'Cluster name')
  .option('-j, --json', 'Output result as JSON')
  .action(
    async (
      version: string | undefined,
      name: string | undefined,
      options: { json?: boolean },
    ) => {
      try {
        const { registry, control } = getServices()
        const cluster = await resolveCluster(registry, version, name, 'Select cluster:')
        if (!cluster) {
          console.log(uiWarning('No clusters found'))
          return
        }

        const info = await describeCluster(registry, cluster)
        const status = await control.status(info)

        if (options.json) {
          console.log(
            JSON.stringify({
              version: info.version,
              cluster: info.name,
              port: info.port,
              running: status.running,
              recovery: info.recovery,
              start: info.start,
              message: status.message,
            }),
          )
        } else {
          console.log(keyValue('Cluster', theme.clusterName(`${info.version}/${info.name}`)))
          console.log(keyValue('Status', statusBadge({ ...info, running: status.running })))
          console.log(keyValue('Start', info.start))
          if (status.message) console.log(status.message)
        }

        if (!status.running) process.exitCode = EXIT_NOT_RUNNING
      } catch (error) {
        exitWithError(error)
      }
    },
  )
