import { Command } from 'commander'
import { ServerManager } from '../../core/server-manager'
import { exitWithError } from '../helpers'
import { terminalPromptPort } from '../ui/prompts'

export const changePasswordCommand = new Command('change-password')
  .description('Change the password of the neo4j user on a running server')
  .action(async () => {
    try {
      const result = await ServerManager.changePassword(terminalPromptPort)
      if (!result.success) {
        process.exitCode = 1
      }
    } catch (error) {
      exitWithError(error)
    }
  })
