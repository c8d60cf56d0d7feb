/**
 * Version Policy
 *
 * Every decision that depends on the installed server version lives here:
 * config file name, pid file location and the connector property names.
 * Servers from 3.0.0 on use conf/neo4j.conf and run/neo4j.pid; older ones
 * use conf/neo4j-server.properties and data/neo4j-service.pid.
 */

import { existsSync } from 'fs'
import { readdir } from 'fs/promises'
import { join } from 'path'
import { defaults } from '../config/defaults'
import { paths } from '../config/paths'
import { createVersionUndetectedError } from './error-handler'
import { isAtLeast, versionFromKernelJar } from './version-utils'
import type { ConfigProperties, PortPair } from '../types'

export type VersionPolicy = {
  serverVersion: string
  // True from the threshold version (3.0.0) on
  modernLayout: boolean
  configPath: string
  pidPath: string
  portProperties(port: number): ConfigProperties
  authProperties(enabled: boolean): ConfigProperties
}

/**
 * https port sits one below the http port
 */
export function getPortPair(httpPort: number): PortPair {
  return { http: httpPort, https: httpPort - 1 }
}

export function createVersionPolicy(
  installPath: string,
  serverVersion: string,
): VersionPolicy {
  const layout = paths.installation(installPath)
  const { fileNames } = defaults
  const modernLayout = isAtLeast(serverVersion, defaults.thresholdVersion)

  return {
    serverVersion,
    modernLayout,
    configPath: modernLayout
      ? join(layout.conf, fileNames.mainConfig)
      : join(layout.conf, fileNames.legacyConfig),
    pidPath: modernLayout
      ? join(layout.run, fileNames.pidFile)
      : join(layout.data, fileNames.legacyPidFile),

    portProperties(port: number): ConfigProperties {
      const ports = getPortPair(port)
      if (modernLayout) {
        return {
          'dbms.connector.https.enabled': false,
          'dbms.connector.http.enabled': true,
          'dbms.connector.http.address': `0.0.0.0:${ports.http}`,
          'dbms.connector.https.address': `localhost:${ports.https}`,
        }
      }
      return {
        'org.neo4j.server.webserver.https.enabled': false,
        'org.neo4j.server.webserver.port': ports.http,
        'org.neo4j.server.webserver.https.port': ports.https,
      }
    },

    // Both names are written; only the one present in the file changes
    authProperties(enabled: boolean): ConfigProperties {
      const value = enabled ? 'true' : 'false'
      return {
        'dbms.security.authorization_enabled': value,
        'dbms.security.auth_enabled': value,
      }
    },
  }
}

/**
 * Read the server version from lib/neo4j-kernel-<version>.jar
 *
 * @throws VERSION_UNDETECTED when no kernel jar is installed
 */
export async function detectServerVersion(installPath: string): Promise<string> {
  const libDir = paths.installation(installPath).lib
  if (!existsSync(libDir)) {
    throw createVersionUndetectedError(installPath)
  }

  const entries = (await readdir(libDir)).sort()
  for (const entry of entries) {
    const version = versionFromKernelJar(entry)
    if (version) return version
  }

  throw createVersionUndetectedError(installPath)
}

export async function loadVersionPolicy(
  installPath: string,
): Promise<VersionPolicy> {
  const serverVersion = await detectServerVersion(installPath)
  return createVersionPolicy(installPath, serverVersion)
}
