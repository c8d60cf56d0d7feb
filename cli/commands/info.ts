import { Command } from 'commander'
import { createManager, exitWithError } from '../helpers'

export const infoCommand = new Command('info')
  .description('Show server status information')
  .action(async (_options: unknown, command: Command) => {
    try {
      const manager = await createManager(command)
      await manager.info()
    } catch (error) {
      exitWithError(error)
    }
  })
