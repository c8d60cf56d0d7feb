import { existsSync } from 'fs'
import { mkdir, readFile, writeFile } from 'fs/promises'
import { dirname } from 'path'
import { paths } from './paths'
import { MAX_STOP_TIMEOUT_MS } from '../core/process-controller'
import {
  ErrorCodes,
  ServerManagerError,
  logWarning,
} from '../core/error-handler'
import type { ManagerSettings, SettingKey } from '../types'

export const SETTING_KEYS: readonly SettingKey[] = [
  'installRoot',
  'catalogUrl',
  'downloadBaseUrl',
  'stopTimeoutSeconds',
]

export function isSettingKey(value: string): value is SettingKey {
  return SETTING_KEYS.some((key) => key === value)
}

function parseSettings(content: string): ManagerSettings {
  const parsed: unknown = JSON.parse(content)
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('settings file is not a JSON object')
  }

  const settings: ManagerSettings = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (key === 'stopTimeoutSeconds' && typeof value === 'number') {
      settings.stopTimeoutSeconds = value
    } else if (key === 'updatedAt' && typeof value === 'string') {
      settings.updatedAt = value
    } else if (
      (key === 'installRoot' ||
        key === 'catalogUrl' ||
        key === 'downloadBaseUrl') &&
      typeof value === 'string'
    ) {
      settings[key] = value
    }
  }
  return settings
}

export class SettingsManager {
  private settings: ManagerSettings | null = null

  constructor(private readonly settingsPath: string = paths.settings) {}

  /**
   * Load settings from disk; a missing file means all defaults
   */
  async load(): Promise<ManagerSettings> {
    if (this.settings) {
      return this.settings
    }

    if (!existsSync(this.settingsPath)) {
      this.settings = {}
      return this.settings
    }

    try {
      const content = await readFile(this.settingsPath, 'utf8')
      this.settings = parseSettings(content)
    } catch (error) {
      logWarning('Settings file corrupted, resetting to defaults', {
        settingsPath: this.settingsPath,
        error: error instanceof Error ? error.message : String(error),
      })
      this.settings = {}
      await this.save()
    }
    return this.settings
  }

  async save(): Promise<void> {
    if (!this.settings) return

    await mkdir(dirname(this.settingsPath), { recursive: true })
    this.settings.updatedAt = new Date().toISOString()
    await writeFile(this.settingsPath, JSON.stringify(this.settings, null, 2))
  }

  async get<K extends SettingKey>(key: K): Promise<ManagerSettings[K]> {
    const settings = await this.load()
    return settings[key]
  }

  /**
   * Set a setting from its string form (as typed on the command line)
   */
  async set(key: SettingKey, rawValue: string): Promise<void> {
    const settings = await this.load()

    if (key === 'stopTimeoutSeconds') {
      const seconds = Number(rawValue)
      if (
        !Number.isFinite(seconds) ||
        seconds <= 0 ||
        seconds * 1000 > MAX_STOP_TIMEOUT_MS
      ) {
        throw new ServerManagerError(
          ErrorCodes.CONFIG_ERROR,
          `${key} must be a positive number of seconds, at most ${MAX_STOP_TIMEOUT_MS / 1000}`,
        )
      }
      settings.stopTimeoutSeconds = seconds
    } else {
      settings[key] = rawValue
    }

    await this.save()
  }

  async unset(key: SettingKey): Promise<void> {
    const settings = await this.load()
    delete settings[key]
    await this.save()
  }
}

export const settingsManager = new SettingsManager()
