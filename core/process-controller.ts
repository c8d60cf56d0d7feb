/**
 * Process Controller
 *
 * Drives the server's own control script (bin/neo4j start|stop|...).
 * The only recovery logic in the manager lives in stop(): when the graceful
 * stop outlives its timeout, the stop command is cancelled and the pid
 * recorded by the last start() is killed.
 *
 * Run at most one controller per installation path; nothing here locks it.
 */

import { existsSync } from 'fs'
import { readFile, readdir, rm } from 'fs/promises'
import { join } from 'path'
import { paths } from '../config/paths'
import {
  ErrorCodes,
  createCommandFailedError,
  createInvalidTimeoutError,
  createPermissionDeniedError,
  logDebug,
  logInfo,
  logWarning,
} from './error-handler'
import { allowAll, type PermissionGate } from './permission-gate'
import { isAbortError, runCommand, type CommandRunner } from './spawn-utils'
import type { PlatformAdapter } from './platform-adapter'
import type { VersionPolicy } from './version-policy'
import type {
  AdminOperation,
  ProcessState,
  StartResult,
  StopResult,
} from '../types'

export type KillFn = (pid: number, signal: NodeJS.Signals) => void

// Largest delay setTimeout honours; longer ones fire immediately
export const MAX_STOP_TIMEOUT_MS = 2147483647

function isNoSuchProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH'
}

export type ProcessControllerOptions = {
  adapter: PlatformAdapter
  // Resolved lazily: the version (and so the pid path) is only known once installed
  getPolicy: () => Promise<VersionPolicy>
  permissionGate?: PermissionGate
  runner?: CommandRunner
  kill?: KillFn
}

export type StopOptions = {
  // Upper bound for the graceful stop command; unbounded when omitted
  timeoutMs?: number
}

export class ProcessController {
  private readonly installPath: string
  private readonly adapter: PlatformAdapter
  private readonly getPolicy: () => Promise<VersionPolicy>
  private readonly permissionGate: PermissionGate
  private readonly runner: CommandRunner
  private readonly kill: KillFn

  private _state: ProcessState = 'not-started'
  private _pid: number | null = null

  constructor(installPath: string, options: ProcessControllerOptions) {
    this.installPath = installPath
    this.adapter = options.adapter
    this.getPolicy = options.getPolicy
    this.permissionGate = options.permissionGate ?? allowAll
    this.runner = options.runner ?? runCommand
    this.kill = options.kill ?? ((pid, signal) => process.kill(pid, signal))
  }

  get state(): ProcessState {
    return this._state
  }

  // Pid captured from the pid file by the most recent start()
  get pid(): number | null {
    return this._pid
  }

  get serverBinaryPath(): string {
    return join(
      paths.installation(this.installPath).bin,
      this.adapter.serverBinary,
    )
  }

  get shellBinaryPath(): string {
    return join(
      paths.installation(this.installPath).bin,
      this.adapter.shellBinary,
    )
  }

  async start(wait = true): Promise<StartResult> {
    const previous = this._state
    this._state = 'starting'

    try {
      await this.runServerCommand(wait ? 'start' : 'start-no-wait')
    } catch (error) {
      this._state = previous
      throw error
    }

    try {
      this._pid = await this.readPidFile()
    } catch (error) {
      this._state = previous
      throw error
    }
    this._state = 'running'
    logInfo('Server started', { installPath: this.installPath, pid: this._pid })

    return { pid: this._pid }
  }

  async stop(options: StopOptions = {}): Promise<StopResult> {
    await this.assertPermitted('stop')

    const { timeoutMs } = options
    if (
      timeoutMs !== undefined &&
      !(timeoutMs >= 0 && timeoutMs <= MAX_STOP_TIMEOUT_MS)
    ) {
      throw createInvalidTimeoutError(timeoutMs)
    }

    const previous = this._state
    const controller = new AbortController()
    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => controller.abort(), timeoutMs)

    this._state = 'stopping'

    try {
      await this.runServerCommand('stop', controller.signal)
    } catch (error) {
      if (!(controller.signal.aborted && isAbortError(error))) {
        this._state = previous
        throw error
      }
      return this.escalateAfterTimeout(timeoutMs, previous)
    } finally {
      clearTimeout(timer)
    }

    this._state = 'stopped'
    return { timedOut: false, killedPid: null }
  }

  async restart(): Promise<void> {
    await this.assertPermitted('restart')
    await this.runServerCommand('restart')
    this._state = 'running'
  }

  async info(): Promise<void> {
    await this.assertPermitted('info')
    await this.runServerCommand('info')
  }

  /**
   * Runs the server in the foreground; no permission gate
   */
  async console(): Promise<void> {
    await this.runServerCommand('console')
  }

  /**
   * Opens the interactive shell, starting the server first when it is not
   * running and stopping it again afterwards.
   */
  async shell(): Promise<void> {
    const policy = await this.getPolicy()
    const notStarted = !existsSync(policy.pidPath)

    if (notStarted) {
      await this.start()
    }

    try {
      await this.run(this.shellBinaryPath, [])
    } catch (shellError) {
      if (notStarted) {
        await this.stopAfterFailedShell()
      }
      throw shellError
    }

    if (notStarted) {
      await this.stop()
    }
  }

  /**
   * Stop, wipe the database and log directories, start again.
   * Destructive; confirmation is the caller's job.
   */
  async reset(): Promise<void> {
    await this.assertPermitted('reset')

    await this.stop()

    const layout = paths.installation(this.installPath)
    for (const dir of [layout.graphDb, layout.log]) {
      await this.emptyDirectory(dir)
    }

    await this.start()
  }

  private async escalateAfterTimeout(
    timeoutMs: number | undefined,
    previous: ProcessState,
  ): Promise<StopResult> {
    const pid = this._pid
    logWarning(
      pid === null
        ? 'Shutdown timeout reached, no known process id to kill'
        : 'Shutdown timeout reached, killing process...',
      { installPath: this.installPath, timeoutMs, pid },
      ErrorCodes.SHUTDOWN_TIMEOUT,
    )

    if (pid === null) {
      this._state = 'stopped'
      return { timedOut: true, killedPid: null }
    }

    try {
      this.kill(pid, 'SIGKILL')
    } catch (error) {
      if (!isNoSuchProcess(error)) {
        this._state = previous
        throw error
      }
      // Exited between the timeout and the kill
      logWarning(
        `Process ${pid} had already exited`,
        { installPath: this.installPath, pid },
        ErrorCodes.SHUTDOWN_TIMEOUT,
      )
      this._pid = null
      this._state = 'stopped'
      return { timedOut: true, killedPid: null }
    }

    this._pid = null
    this._state = 'stopped'
    return { timedOut: true, killedPid: pid }
  }

  private async stopAfterFailedShell(): Promise<void> {
    try {
      await this.stop()
    } catch (stopError) {
      logWarning('Could not stop the server after the shell failed', {
        installPath: this.installPath,
        error:
          stopError instanceof Error ? stopError.message : String(stopError),
      })
    }
  }

  private async emptyDirectory(dir: string): Promise<void> {
    if (!existsSync(dir)) return

    logInfo(`Deleting all files in ${dir}`)
    for (const entry of await readdir(dir)) {
      await rm(join(dir, entry), { recursive: true, force: true })
    }
  }

  private async readPidFile(): Promise<number | null> {
    const { pidPath } = await this.getPolicy()
    if (!existsSync(pidPath)) {
      logWarning('Server started but wrote no pid file', { pidPath })
      return null
    }

    const content = await readFile(pidPath, 'utf8')
    const firstLine = content.trim().split('\n')[0].trim()
    const pid = /^\d+$/.test(firstLine) ? Number(firstLine) : NaN
    // 0 and negative values address process groups, not the server
    if (!Number.isSafeInteger(pid) || pid <= 0) {
      logWarning('Pid file does not contain a process id', {
        pidPath,
        content,
      })
      return null
    }
    return pid
  }

  private async assertPermitted(operation: AdminOperation): Promise<void> {
    if (!(await this.permissionGate(operation))) {
      throw createPermissionDeniedError(operation)
    }
  }

  private async runServerCommand(
    subcommand: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.run(this.serverBinaryPath, [subcommand], signal)
  }

  /**
   * @throws COMMAND_FAILED on a non-zero exit or a spawn failure
   */
  private async run(
    command: string,
    args: string[],
    signal?: AbortSignal,
  ): Promise<void> {
    const commandLine = [command, ...args].join(' ')
    logDebug('Running server command', { command: commandLine })

    let exitCode: number | null
    try {
      exitCode = await this.runner(command, args, {
        cwd: this.installPath,
        signal,
        shell: this.adapter.runThroughShell,
      })
    } catch (error) {
      if (isAbortError(error)) throw error
      logDebug('Server command could not be started', {
        command: commandLine,
        error: error instanceof Error ? error.message : String(error),
      })
      throw createCommandFailedError(commandLine, null)
    }

    if (exitCode !== 0) {
      throw createCommandFailedError(commandLine, exitCode)
    }
  }
}
