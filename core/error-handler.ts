/**
 * Error Handler
 *
 * Centralized error type and logging.
 * - Core code throws ServerManagerError and never exits the process
 * - CLI commands log, print and exit with status 1
 * - Every entry is appended to ~/.neo4j-server-manager/manager.log
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import chalk from 'chalk'
import { paths } from '../config/paths'

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info'

export type ManagerErrorInfo = {
  code: string
  message: string
  severity: ErrorSeverity
  suggestion?: string
  context?: Record<string, unknown>
}

export const ErrorCodes = {
  // Version resolution
  UNKNOWN_NICKNAME: 'UNKNOWN_NICKNAME',
  NICKNAME_HAS_NO_VERSION: 'NICKNAME_HAS_NO_VERSION',
  CATALOG_FETCH_FAILED: 'CATALOG_FETCH_FAILED',

  // Download and install
  ARCHIVE_UNAVAILABLE: 'ARCHIVE_UNAVAILABLE',
  DOWNLOAD_FAILED: 'DOWNLOAD_FAILED',
  INSTALL_FAILED: 'INSTALL_FAILED',

  // Process lifecycle
  COMMAND_FAILED: 'COMMAND_FAILED',
  SHUTDOWN_TIMEOUT: 'SHUTDOWN_TIMEOUT',
  INVALID_TIMEOUT: 'INVALID_TIMEOUT',
  PERMISSION_DENIED: 'PERMISSION_DENIED',

  // Installation files
  CONFIG_ERROR: 'CONFIG_ERROR',
  VERSION_UNDETECTED: 'VERSION_UNDETECTED',

  // Password change
  MISSING_NEW_PASSWORD: 'MISSING_NEW_PASSWORD',
  PASSWORD_CHANGE_FAILED: 'PASSWORD_CHANGE_FAILED',

  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

export class ServerManagerError extends Error {
  public readonly code: ErrorCode
  public readonly severity: ErrorSeverity
  public readonly suggestion?: string
  public readonly context?: Record<string, unknown>

  constructor(
    code: ErrorCode,
    message: string,
    severity: ErrorSeverity = 'error',
    suggestion?: string,
    context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'ServerManagerError'
    this.code = code
    this.severity = severity
    this.suggestion = suggestion
    this.context = context

    Error.captureStackTrace(this, ServerManagerError)
  }

  static from(
    error: unknown,
    code: ErrorCode = ErrorCodes.UNKNOWN_ERROR,
    suggestion?: string,
  ): ServerManagerError {
    if (error instanceof ServerManagerError) {
      return error
    }

    const message = error instanceof Error ? error.message : String(error)

    return new ServerManagerError(code, message, 'error', suggestion, {
      originalError: error instanceof Error ? error.stack : undefined,
    })
  }
}

/**
 * True for both nickname failures (unknown key, key without a version)
 */
export function isVersionResolutionError(
  error: unknown,
): error is ServerManagerError {
  return (
    error instanceof ServerManagerError &&
    (error.code === ErrorCodes.UNKNOWN_NICKNAME ||
      error.code === ErrorCodes.NICKNAME_HAS_NO_VERSION)
  )
}

function appendToLogFile(entry: ManagerErrorInfo): void {
  try {
    const logPath = paths.log
    const logDir = dirname(logPath)
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true })
    }
    const logEntry = {
      timestamp: new Date().toISOString(),
      ...entry,
    }
    appendFileSync(logPath, JSON.stringify(logEntry) + '\n')
  } catch {
    // Logging must never fail the operation being logged
  }
}

function formatSeverity(severity: ErrorSeverity): string {
  switch (severity) {
    case 'fatal':
      return chalk.red.bold('[FATAL]')
    case 'error':
      return chalk.red('[ERROR]')
    case 'warning':
      return chalk.yellow('[WARN]')
    case 'info':
      return chalk.blue('[INFO]')
  }
}

/**
 * Log an error to console and log file
 */
export function logError(error: ManagerErrorInfo): void {
  const prefix = formatSeverity(error.severity)
  console.error(`${prefix} [${error.code}] ${error.message}`)

  if (error.suggestion) {
    console.error(chalk.yellow(`  Suggestion: ${error.suggestion}`))
  }

  appendToLogFile(error)
}

export function logManagerError(error: ServerManagerError): void {
  logError({
    code: error.code,
    message: error.message,
    severity: error.severity,
    suggestion: error.suggestion,
    context: error.context,
  })
}

/**
 * Log a warning (console + file)
 */
export function logWarning(
  message: string,
  context?: Record<string, unknown>,
  code = 'WARNING',
): void {
  console.warn(chalk.yellow(`  ⚠ ${message}`))

  appendToLogFile({
    code,
    message,
    severity: 'warning',
    context,
  })
}

export function logInfo(
  message: string,
  context?: Record<string, unknown>,
): void {
  appendToLogFile({
    code: 'INFO',
    message,
    severity: 'info',
    context,
  })
}

/**
 * Log a debug message (only to file, not console)
 */
export function logDebug(
  message: string,
  context?: Record<string, unknown>,
): void {
  appendToLogFile({
    code: 'DEBUG',
    message,
    severity: 'info',
    context,
  })
}

export function createUnknownNicknameError(nickname: string): ServerManagerError {
  return new ServerManagerError(
    ErrorCodes.UNKNOWN_NICKNAME,
    `Invalid version identifier: ${nickname}`,
    'error',
    'Use a literal version such as "community-3.5.1", or a nickname listed in the version catalog',
    { nickname },
  )
}

export function createNicknameHasNoVersionError(
  nickname: string,
): ServerManagerError {
  return new ServerManagerError(
    ErrorCodes.NICKNAME_HAS_NO_VERSION,
    `There is not currently a version for ${nickname}`,
    'error',
    'Pick another nickname or a literal version',
    { nickname },
  )
}

export function createArchiveUnavailableError(
  version: string,
  status: number,
): ServerManagerError {
  return new ServerManagerError(
    ErrorCodes.ARCHIVE_UNAVAILABLE,
    `${version} is not available to download`,
    'error',
    'Check the version string, or set a different download base URL',
    { version, status },
  )
}

export function createCommandFailedError(
  command: string,
  exitCode: number | null,
): ServerManagerError {
  return new ServerManagerError(
    ErrorCodes.COMMAND_FAILED,
    `Unable to run: ${command}`,
    'error',
    undefined,
    { command, exitCode },
  )
}

export function createInvalidTimeoutError(
  timeoutMs: number,
): ServerManagerError {
  return new ServerManagerError(
    ErrorCodes.INVALID_TIMEOUT,
    `Invalid stop timeout: ${timeoutMs}ms`,
    'error',
    'Use a timeout between 0 and 2147483 seconds',
    { timeoutMs },
  )
}

export function createPermissionDeniedError(
  operation: string,
): ServerManagerError {
  return new ServerManagerError(
    ErrorCodes.PERMISSION_DENIED,
    `Not permitted to ${operation} the server`,
    'error',
    'Run this command as a user with administrative rights',
    { operation },
  )
}

export function createVersionUndetectedError(
  installPath: string,
): ServerManagerError {
  return new ServerManagerError(
    ErrorCodes.VERSION_UNDETECTED,
    `Could not detect the server version under ${installPath}`,
    'error',
    'Run "neo4j-server install <edition>" first',
    { installPath },
  )
}

export function createConfigError(
  configPath: string,
  cause: unknown,
): ServerManagerError {
  const reason = cause instanceof Error ? cause.message : String(cause)
  return new ServerManagerError(
    ErrorCodes.CONFIG_ERROR,
    `Unable to update ${configPath}: ${reason}`,
    'error',
    undefined,
    { configPath },
  )
}
