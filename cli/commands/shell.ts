import { Command } from 'commander'
import { createManager, exitWithError } from '../helpers'

export const shellCommand = new Command('shell')
  .description('Open the interactive shell, starting the server if needed')
  .action(async (_options: unknown, command: Command) => {
    try {
      const manager = await createManager(command)
      await manager.shell()
    } catch (error) {
      exitWithError(error)
    }
  })
