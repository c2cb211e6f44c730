import { Command } from 'commander'
import { describeCluster, exitWithError, getServices, resolveCluster } from '../helpers'
import { createSpinner } from '../ui/spinner'
import { uiWarning } from '../ui/theme'

export const restartCommand = new Command('restart')
  .description('Stop a cluster if it is running, then start it')
  .argument('[version]', 'PostgreSQL major version')
  .argument('[name]', 'Cluster name')
  .option('-f, --force', 'Start even when start.conf says disabled')
  .action(
    async (
      version: string | undefined,
      name: string | undefined,
      options: { force?: boolean },
    ) => {
      try {
        const { registry, control } = getServices()
        const cluster = await resolveCluster(registry, version, name, 'Select cluster to restart:')
        if (!cluster) {
          console.log(uiWarning('No clusters found'))
          return
        }

        const spinner = createSpinner(`Restarting ${cluster.version}/${cluster.name}...`)
        spinner.start()
        try {
          const info = await control.restart(
            await describeCluster(registry, cluster),
            { force: options.force },
          )
          spinner.succeed(`Cluster ${cluster.version}/${cluster.name} running on port ${info.port}`)
        } catch (error) {
          spinner.fail()
          throw error
        }
      } catch (error) {
        exitWithError(error)
      }
    },
  )
