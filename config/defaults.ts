/**
 * Default configuration values for the server manager.
 * Settings from config.json and CLI flags take precedence where they exist.
 */

export type ServerFileNames = {
  // Config file name for servers >= threshold version
  mainConfig: string
  // Config file name for servers below the threshold version
  legacyConfig: string
  // PID file name (under run/) for servers >= threshold version
  pidFile: string
  // PID file name (under data/) for servers below the threshold version
  legacyPidFile: string
}

export type Defaults = {
  catalogUrl: string
  downloadBaseUrl: string
  passwordChangeAddress: string
  currentPassword: string
  adminUsername: string
  thresholdVersion: string
  environment: string
  installRoot: string
  fileNames: ServerFileNames
}

export const defaults: Defaults = {
  catalogUrl:
    'https://raw.githubusercontent.com/neo4jrb/neo4j-rake_tasks/master/neo4j_versions.yml',
  downloadBaseUrl: 'https://dist.neo4j.org',
  passwordChangeAddress: 'http://localhost:7474',
  currentPassword: 'neo4j',
  adminUsername: 'neo4j',
  thresholdVersion: '3.0.0',
  environment: 'development',
  installRoot: 'db/neo4j',
  fileNames: {
    mainConfig: 'neo4j.conf',
    legacyConfig: 'neo4j-server.properties',
    pidFile: 'neo4j.pid',
    legacyPidFile: 'neo4j-service.pid',
  },
}
