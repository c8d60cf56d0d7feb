/**
 * Host operating system families the manager knows how to drive.
 */
export enum Platform {
  Unix = 'unix',
  Windows = 'windows',
}

export type ProgressCallback = (progress: {
  stage: string
  message: string
}) => void

/**
 * Lifecycle states of the managed server process.
 * Stopped may transition back to Starting.
 */
export type ProcessState =
  | 'not-started'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'stopped'

/**
 * Operations guarded by the elevated-permission gate
 */
export type AdminOperation = 'stop' | 'restart' | 'info' | 'reset'

/**
 * Property name -> desired value for a config file rewrite
 */
export type ConfigProperties = Record<string, string | number | boolean>

export type PortPair = {
  http: number
  https: number
}

export type InstallResult = {
  status: 'installed' | 'already-installed'
  version: string
  path: string
}

export type StopResult = {
  timedOut: boolean
  killedPid: number | null
}

export type StartResult = {
  pid: number | null
}

export type PasswordChangeResult =
  | { success: true; username: string; password: string }
  | { success: false; message: string }

/**
 * Persisted user settings (all optional, defaults live in config/defaults)
 */
export type ManagerSettings = {
  installRoot?: string
  catalogUrl?: string
  downloadBaseUrl?: string
  stopTimeoutSeconds?: number
  updatedAt?: string
}

export type SettingKey = Exclude<keyof ManagerSettings, 'updatedAt'>

export type FetchFn = typeof fetch
