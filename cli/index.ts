import { program } from 'commander'
import { createRequire } from 'module'
import { backupCommand } from './commands/backup'
import { createCommand } from './commands/create'
import { dropCommand } from './commands/drop'
import { listCommand } from './commands/list'
import { portsCommand } from './commands/ports'
import { renameCommand } from './commands/rename'
import { restartCommand } from './commands/restart'
import { restoreCommand } from './commands/restore'
import { startCommand } from './commands/start'
import { statusCommand } from './commands/status'
import { stopCommand } from './commands/stop'
import { upgradeCommand } from './commands/upgrade'

const require = createRequire(import.meta.url)
const pkg = require('../package.json') as { version: string }

export async function run(): Promise<void> {
  program
    .name('pgcluster')
    .description('Create, control, upgrade and back up PostgreSQL clusters')
    .version(pkg.version, '-v, --version', 'output the version number')

  program.addCommand(createCommand)
  program.addCommand(dropCommand)
  program.addCommand(renameCommand)
  program.addCommand(listCommand)
  program.addCommand(startCommand)
  program.addCommand(stopCommand)
  program.addCommand(restartCommand)
  program.addCommand(statusCommand)
  program.addCommand(upgradeCommand)
  program.addCommand(backupCommand)
  program.addCommand(restoreCommand)
  program.addCommand(portsCommand)

  await program.parseAsync()
}
