import { Command } from 'commander'
import { getPortPair } from '../../core/version-policy'
import { createManager, exitWithError, parsePort } from '../helpers'
import { theme, uiSuccess } from '../ui/theme'

function parseSwitch(value: string): boolean {
  switch (value.toLowerCase()) {
    case 'on':
    case 'true':
    case 'enable':
      return true
    case 'off':
    case 'false':
    case 'disable':
      return false
    default:
      throw new Error(`Expected on or off, got "${value}"`)
  }
}

export const configCommand = new Command('config')
  .description('Change the server configuration file')
  .addCommand(
    new Command('auth')
      .description('Enable or disable authentication')
      .argument('<state>', 'on or off')
      .action(async (state: string, _options: unknown, command: Command) => {
        try {
          const enabled = parseSwitch(state)
          const manager = await createManager(command)
          await manager.setAuthEnabled(enabled)
          console.log(
            uiSuccess(`Authentication ${enabled ? 'enabled' : 'disabled'}`),
          )
        } catch (error) {
          exitWithError(error)
        }
      }),
  )
  .addCommand(
    new Command('port')
      .description('Set the http port; https moves to port - 1, disabled')
      .argument('<port>', 'http port')
      .action(async (value: string, _options: unknown, command: Command) => {
        try {
          const port = parsePort(value)
          const manager = await createManager(command)
          await manager.setPort(port)
          const ports = getPortPair(port)
          console.log(
            uiSuccess(
              `Ports set: http ${theme.port(String(ports.http))}, https ${theme.port(String(ports.https))}`,
            ),
          )
        } catch (error) {
          exitWithError(error)
        }
      }),
  )
