import { Command } from 'commander'
import { exitWithError, getServices, resolveCluster } from '../helpers'
import { promptConfirm } from '../ui/prompts'
import { createSpinner } from '../ui/spinner'
import { uiWarning } from '../ui/theme'

export const dropCommand = new Command('drop')
  .description('Remove a cluster with its data, configuration and log files')
  .argument('[version]', 'PostgreSQL major version')
  .argument('[name]', 'Cluster name')
  .option('--stop', 'Stop the cluster first when it is running')
  .action(
    async (
      version: string | undefined,
      name: string | undefined,
      options: { stop?: boolean },
    ) => {
      try {
        const { registry, manager } = getServices()
        const cluster = await resolveCluster(registry, version, name, 'Select cluster to drop:')
        if (!cluster) {
          console.log(uiWarning('No clusters found'))
          return
        }

        // picked from a list: make sure
        if (version === undefined) {
          const confirmed = await promptConfirm(
            `Drop cluster ${cluster.version}/${cluster.name} and all its data?`,
            false,
          )
          if (!confirmed) {
            console.log(uiWarning('Cancelled'))
            return
          }
        }

        const spinner = createSpinner(`Dropping ${cluster.version}/${cluster.name}...`)
        spinner.start()
        try {
          await manager.drop(cluster.version, cluster.name, {
            stopIfRunning: options.stop,
          })
        } catch (error) {
          spinner.fail()
          throw error
        }
        spinner.succeed(`Cluster ${cluster.version}/${cluster.name} dropped`)
      } catch (error) {
        exitWithError(error)
      }
    },
  )
