import { Command } from 'commander'
import { exitWithError, getServices } from '../helpers'
import { createSpinner } from '../ui/spinner'

export const renameCommand = new Command('rename')
  .description('Rename a cluster, moving its configuration, data and log files')
  .argument('<version>', 'PostgreSQL major version')
  .argument('<name>', 'Current cluster name')
  .argument('<new-name>', 'New cluster name')
  .action(async (version: string, name: string, newName: string) => {
    try {
      const { manager } = getServices()
      const spinner = createSpinner(`Renaming ${version}/${name} to ${version}/${newName}...`)
      spinner.start()
      try {
        await manager.rename(version, name, newName)
      } catch (error) {
        spinner.fail()
        throw error
      }
      spinner.succeed(`Cluster ${version}/${name} renamed to ${version}/${newName}`)
    } catch (error) {
      exitWithError(error)
    }
  })
