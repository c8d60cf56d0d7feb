import { Command } from 'commander'
import { createManager, exitWithError } from '../helpers'
import { withSpinner } from '../ui/spinner'
import { theme, uiSuccess, uiInfo } from '../ui/theme'

export const installCommand = new Command('install')
  .description('Download and install a Neo4j edition, e.g. community-latest')
  .argument('<edition>', 'edition and version or nickname')
  .option('-j, --json', 'Output result as JSON')
  .action(
    async (edition: string, options: { json?: boolean }, command: Command) => {
      try {
        const manager = await createManager(command)
        const result = await withSpinner(
          `Installing ${edition}...`,
          (onProgress) => manager.install(edition, onProgress),
        )

        if (options.json) {
          console.log(JSON.stringify(result))
          return
        }

        if (result.status === 'already-installed') {
          console.log(
            uiInfo(
              `neo4j-${theme.version(result.version)} requested, a server is already installed in ${theme.path(result.path)}`,
            ),
          )
        } else {
          console.log(
            uiSuccess(
              `neo4j-${theme.version(result.version)} installed to ${theme.path(result.path)}`,
            ),
          )
        }
      } catch (error) {
        exitWithError(error)
      }
    },
  )
