import { Command } from 'commander'
import { createManager, exitWithError } from '../helpers'

export const consoleCommand = new Command('console')
  .description('Run the server in the foreground')
  .action(async (_options: unknown, command: Command) => {
    try {
      const manager = await createManager(command)
      await manager.console()
    } catch (error) {
      exitWithError(error)
    }
  })
