import { program } from 'commander'
import { createRequire } from 'module'
import { defaults } from '../config/defaults'
import { installCommand } from './commands/install'
import { startCommand } from './commands/start'
import { stopCommand } from './commands/stop'
import { consoleCommand } from './commands/console'
import { shellCommand } from './commands/shell'
import { infoCommand } from './commands/info'
import { restartCommand } from './commands/restart'
import { resetCommand } from './commands/reset'
import { configCommand } from './commands/config'
import { changePasswordCommand } from './commands/change-password'
import { settingsCommand } from './commands/settings'

const require = createRequire(import.meta.url)
const pkg = require('../package.json') as { version: string }

export async function run(): Promise<void> {
  program
    .name('neo4j-server')
    .description('Install, run and configure a local Neo4j server')
    .version(pkg.version, '-v, --version', 'output the version number')
    .option('-p, --path <dir>', 'installation path (overrides --environment)')
    .option(
      '-e, --environment <env>',
      'environment name; installs under <installRoot>/<env>',
      defaults.environment,
    )

  program.addCommand(installCommand)
  program.addCommand(startCommand)
  program.addCommand(stopCommand)
  program.addCommand(consoleCommand)
  program.addCommand(shellCommand)
  program.addCommand(infoCommand)
  program.addCommand(restartCommand)
  program.addCommand(resetCommand)
  program.addCommand(configCommand)
  program.addCommand(changePasswordCommand)
  program.addCommand(settingsCommand)

  await program.parseAsync()
}
