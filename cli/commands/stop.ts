import { Command } from 'commander'
import { settingsManager } from '../../config/settings'
import { createInvalidTimeoutError } from '../../core/error-handler'
import { MAX_STOP_TIMEOUT_MS } from '../../core/process-controller'
import { createManager, exitWithError } from '../helpers'
import { uiSuccess, uiWarning } from '../ui/theme'

export const stopCommand = new Command('stop')
  .description('Stop the server, killing it if it outlives the timeout')
  .option('-t, --timeout <seconds>', 'Seconds to wait for a graceful stop')
  .option('-j, --json', 'Output result as JSON')
  .action(
    async (options: { timeout?: string; json?: boolean }, command: Command) => {
      try {
        const seconds =
          options.timeout !== undefined
            ? Number(options.timeout)
            : await settingsManager.get('stopTimeoutSeconds')
        if (
          seconds !== undefined &&
          !(seconds > 0 && seconds * 1000 <= MAX_STOP_TIMEOUT_MS)
        ) {
          throw createInvalidTimeoutError(seconds * 1000)
        }

        const manager = await createManager(command)
        const result = await manager.stop(
          seconds === undefined ? undefined : seconds * 1000,
        )

        if (options.json) {
          console.log(JSON.stringify(result))
        } else if (!result.timedOut) {
          console.log(uiSuccess('Server stopped'))
        } else if (result.killedPid !== null) {
          console.log(
            uiWarning(`Shutdown timed out, killed pid ${result.killedPid}`),
          )
        } else {
          console.log(uiWarning('Shutdown timed out, no known pid to kill'))
        }
      } catch (error) {
        exitWithError(error)
      }
    },
  )
