import { Command } from 'commander'
import { createManager, exitWithError } from '../helpers'
import { uiSuccess } from '../ui/theme'

export const restartCommand = new Command('restart')
  .description('Restart the server')
  .action(async (_options: unknown, command: Command) => {
    try {
      const manager = await createManager(command)
      await manager.restart()
      console.log(uiSuccess('Server restarted'))
    } catch (error) {
      exitWithError(error)
    }
  })
