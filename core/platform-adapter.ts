/**
 * Platform Adapter
 *
 * Supplies the OS-specific file names and archive conventions. Everything
 * else joins paths the same way on every OS and asks the adapter only for
 * the names.
 */

import { platform as osPlatform } from 'os'
import { Platform } from '../types'

export type PlatformAdapter = {
  platform: Platform
  // Server control script in bin/
  serverBinary: string
  // Interactive shell in bin/
  shellBinary: string
  // Download artifact suffix, e.g. "unix.tar.gz"
  archiveSuffix: string
  archiveFormat: 'tar.gz' | 'zip'
  // .bat scripts must be started through cmd.exe
  runThroughShell: boolean
}

export const unixAdapter: PlatformAdapter = {
  platform: Platform.Unix,
  serverBinary: 'neo4j',
  shellBinary: 'neo4j-shell',
  archiveSuffix: 'unix.tar.gz',
  archiveFormat: 'tar.gz',
  runThroughShell: false,
}

export const windowsAdapter: PlatformAdapter = {
  platform: Platform.Windows,
  serverBinary: 'Neo4j.bat',
  shellBinary: 'Neo4jShell.bat',
  archiveSuffix: 'windows.zip',
  archiveFormat: 'zip',
  runThroughShell: true,
}

export function getPlatformAdapter(platform: Platform): PlatformAdapter {
  switch (platform) {
    case Platform.Unix:
      return unixAdapter
    case Platform.Windows:
      return windowsAdapter
  }
}

/**
 * Pick the adapter for the host OS (called once per manager)
 */
export function createPlatformAdapter(
  hostPlatform: NodeJS.Platform = osPlatform(),
): PlatformAdapter {
  return hostPlatform === 'win32' ? windowsAdapter : unixAdapter
}
