import { Command, Option } from 'commander'
import type { StopMode } from '../../core/cluster-control'
import { describeCluster, exitWithError, getServices, resolveCluster } from '../helpers'
import { createSpinner } from '../ui/spinner'
import { uiSuccess, uiWarning } from '../ui/theme'

const STOP_MODES: readonly StopMode[] = ['smart', 'fast', 'immediate']

function isStopMode(value: string): value is StopMode {
  return (STOP_MODES as readonly string[]).includes(value)
}

export const stopCommand = new Command('stop')
  .description('Stop a cluster')
  .argument('[version]', 'PostgreSQL major version')
  .argument('[name]', 'Cluster name')
  .option('-a, --all', 'Stop all running clusters')
  .addOption(
    new Option('-m, --mode <mode>', 'Shutdown mode').choices(STOP_MODES).default('fast'),
  )
  .action(
    async (
      version: string | undefined,
      name: string | undefined,
      options: { all?: boolean; mode: string },
    ) => {
      try {
        const { registry, control } = getServices()
        const mode = isStopMode(options.mode) ? options.mode : 'fast'

        if (options.all) {
          const running = (await registry.listAll()).filter((c) => c.running)
          if (running.length === 0) {
            console.log(uiWarning('No running clusters found'))
            return
          }
          for (const info of running) {
            const spinner = createSpinner(`Stopping ${info.version}/${info.name}...`)
            spinner.start()
            try {
              await control.stop(info, mode)
            } catch (error) {
              spinner.fail()
              throw error
            }
            spinner.succeed(`Stopped ${info.version}/${info.name}`)
          }
          console.log(uiSuccess(`Stopped ${running.length} cluster(s)`))
          return
        }

        const cluster = await resolveCluster(registry, version, name, 'Select cluster to stop:')
        if (!cluster) {
          console.log(uiWarning('No clusters found'))
          return
        }

        const info = await describeCluster(registry, cluster)
        if (!info.running) {
          console.log(uiWarning(`Cluster ${cluster.version}/${cluster.name} is not running`))
          return
        }

        const spinner = createSpinner(`Stopping ${cluster.version}/${cluster.name}...`)
        spinner.start()
        try {
          await control.stop(info, mode)
        } catch (error) {
          spinner.fail()
          throw error
        }
        spinner.succeed(`Cluster ${cluster.version}/${cluster.name} stopped`)
      } catch (error) {
        exitWithError(error)
      }
    },
  )
