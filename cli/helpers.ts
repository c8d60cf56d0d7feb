import type { Command } from 'commander'
import { defaults } from '../config/defaults'
import { paths } from '../config/paths'
import { settingsManager } from '../config/settings'
import { ServerManagerError, logManagerError } from '../core/error-handler'
import { ServerManager } from '../core/server-manager'
import { VersionCatalog } from '../core/version-catalog'

export type GlobalOptions = {
  path?: string
  environment?: string
}

/**
 * Installation path: --path, else <installRoot>/<environment>
 */
export async function resolveInstallPath(
  options: GlobalOptions,
): Promise<string> {
  if (options.path) {
    return options.path
  }
  const installRoot =
    (await settingsManager.get('installRoot')) ?? defaults.installRoot
  return paths.getEnvironmentPath(
    installRoot,
    options.environment ?? defaults.environment,
  )
}

/**
 * Build a manager from the global options and persisted settings
 */
export async function createManager(command: Command): Promise<ServerManager> {
  const options = command.optsWithGlobals<GlobalOptions>()
  const installPath = await resolveInstallPath(options)
  const catalogUrl = await settingsManager.get('catalogUrl')
  const downloadBaseUrl = await settingsManager.get('downloadBaseUrl')

  return new ServerManager(installPath, {
    catalog: catalogUrl ? new VersionCatalog({ url: catalogUrl }) : undefined,
    downloadBaseUrl,
  })
}

/**
 * Log, print and exit; commands never return after a failure
 */
export function exitWithError(error: unknown): never {
  logManagerError(ServerManagerError.from(error))
  process.exit(1)
}

export function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 2 || port > 65535) {
    throw new Error(`Invalid port: ${value} (expected 2-65535)`)
  }
  return port
}
