import { Command } from 'commander'
import {
  isSettingKey,
  settingsManager,
  SETTING_KEYS,
} from '../../config/settings'
import { exitWithError } from '../helpers'
import { keyValue, uiSuccess } from '../ui/theme'
import type { SettingKey } from '../../types'

function toSettingKey(value: string): SettingKey {
  if (!isSettingKey(value)) {
    throw new Error(
      `Unknown setting "${value}" (expected one of: ${SETTING_KEYS.join(', ')})`,
    )
  }
  return value
}

export const settingsCommand = new Command('settings')
  .description('Manage persisted manager settings')
  .addCommand(
    new Command('show').description('Show all settings').action(async () => {
      try {
        const settings = await settingsManager.load()
        for (const key of SETTING_KEYS) {
          const value = settings[key]
          console.log(
            keyValue(key, value === undefined ? '(default)' : String(value)),
          )
        }
      } catch (error) {
        exitWithError(error)
      }
    }),
  )
  .addCommand(
    new Command('set')
      .description('Set a setting')
      .argument('<key>')
      .argument('<value>')
      .action(async (key: string, value: string) => {
        try {
          await settingsManager.set(toSettingKey(key), value)
          console.log(uiSuccess(`${key} = ${value}`))
        } catch (error) {
          exitWithError(error)
        }
      }),
  )
  .addCommand(
    new Command('unset')
      .description('Reset a setting to its default')
      .argument('<key>')
      .action(async (key: string) => {
        try {
          await settingsManager.unset(toSettingKey(key))
          console.log(uiSuccess(`${key} reset to default`))
        } catch (error) {
          exitWithError(error)
        }
      }),
  )
