import { Command } from 'commander'
import { createManager, exitWithError } from '../helpers'
import { uiSuccess } from '../ui/theme'

export const startCommand = new Command('start')
  .description('Start the server')
  .option('--no-wait', 'Return without waiting for the server to be ready')
  .action(async (options: { wait: boolean }, command: Command) => {
    try {
      const manager = await createManager(command)
      const { pid } = await manager.start(options.wait)
      console.log(
        uiSuccess(
          pid === null ? 'Server started' : `Server started (pid ${pid})`,
        ),
      )
    } catch (error) {
      exitWithError(error)
    }
  })
