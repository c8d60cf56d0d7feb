import { homedir } from 'os'
import { join } from 'path'

/**
 * Manager home directory. NEO4J_MANAGER_HOME overrides it, which keeps
 * tests away from the real home directory.
 */
function getManagerHome(): string {
  return process.env.NEO4J_MANAGER_HOME || join(homedir(), '.neo4j-server-manager')
}

/**
 * Fixed directory layout under an installation path
 */
export type InstallationPaths = {
  root: string
  bin: string
  conf: string
  lib: string
  data: string
  run: string
  // Primary database directory, wiped by reset
  graphDb: string
  // Server log directory, wiped by reset
  log: string
}

export const paths = {
  // Structured log file
  get log(): string {
    return join(getManagerHome(), 'manager.log')
  },

  // Persisted user settings
  get settings(): string {
    return join(getManagerHome(), 'config.json')
  },

  /**
   * Get every directory of an installation rooted at `root`
   */
  installation(root: string): InstallationPaths {
    return {
      root,
      bin: join(root, 'bin'),
      conf: join(root, 'conf'),
      lib: join(root, 'lib'),
      data: join(root, 'data'),
      run: join(root, 'run'),
      graphDb: join(root, 'data', 'graph.db'),
      log: join(root, 'data', 'log'),
    }
  },

  /**
   * Installation path for an environment, e.g. db/neo4j/development
   */
  getEnvironmentPath(installRoot: string, environment: string): string {
    return join(installRoot, environment)
  },
}
