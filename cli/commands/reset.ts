import { Command } from 'commander'
import { createManager, exitWithError } from '../helpers'
import { promptConfirm } from '../ui/prompts'
import { uiSuccess, uiWarning } from '../ui/theme'

export const resetCommand = new Command('reset')
  .description('Stop the server, delete all data and logs, start it again')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (options: { yes?: boolean }, command: Command) => {
    try {
      const manager = await createManager(command)

      if (!options.yes) {
        const confirmed = await promptConfirm(
          `Delete every database file under ${manager.path}?`,
          false,
        )
        if (!confirmed) {
          console.log(uiWarning('Reset cancelled'))
          return
        }
      }

      await manager.reset()
      console.log(uiSuccess('Server data reset'))
    } catch (error) {
      exitWithError(error)
    }
  })
