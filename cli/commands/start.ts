import { Command } from 'commander'
import { describeCluster, exitWithError, getServices, resolveCluster } from '../helpers'
import { createSpinner } from '../ui/spinner'
import { uiWarning } from '../ui/theme'

export const startCommand = new Command('start')
  .description('Start a cluster')
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
        const cluster = await resolveCluster(registry, version, name, 'Select cluster to start:')
        if (!cluster) {
          console.log(uiWarning('No clusters found'))
          return
        }

        const info = await describeCluster(registry, cluster)
        if (info.running) {
          console.log(uiWarning(`Cluster ${cluster.version}/${cluster.name} is already running`))
          return
        }

        const spinner = createSpinner(`Starting ${cluster.version}/${cluster.name}...`)
        spinner.start()
        try {
          await control.start(info, { force: options.force })
        } catch (error) {
          spinner.fail()
          throw error
        }
        spinner.succeed(`Cluster ${cluster.version}/${cluster.name} started on port ${info.port}`)
      } catch (error) {
        exitWithError(error)
      }
    },
  )
