/**
 * Promise wrappers around child_process.spawn
 *
 * - spawnAsync captures output (archive extraction, helpers)
 * - runCommand hands the terminal to the child (server subcommands,
 *   interactive console and shell) and resolves with its exit code
 */

import { spawn } from 'child_process'

export type SpawnResult = {
  stdout: string
  stderr: string
}

export type RunOptions = {
  cwd?: string
  // Aborting kills the child and rejects with an AbortError
  signal?: AbortSignal
  // Windows batch files can only be started through the shell
  shell?: boolean
}

/**
 * Runs a command to completion and reports its exit code.
 * Injected into the process controller so tests never spawn the server.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions,
) => Promise<number | null>

/**
 * Execute a command using spawn with argument array
 *
 * @throws Error if the command exits non-zero or cannot be executed
 */
export function spawnAsync(
  command: string,
  args: string[],
): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let settled = false

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })
    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    proc.on('close', (code) => {
      if (settled) return
      settled = true
      if (code === 0) {
        resolve({ stdout, stderr })
      } else {
        reject(
          new Error(
            `Command "${command} ${args.join(' ')}" failed with code ${code}: ${stderr || stdout}`,
          ),
        )
      }
    })

    proc.on('error', (err) => {
      if (settled) return
      settled = true
      reject(new Error(`Failed to execute "${command}": ${err.message}`))
    })
  })
}

/**
 * Default CommandRunner: inherits stdio and settles on whichever of
 * exit or abort happens first.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    // With shell: true the command line is re-parsed, so quote the binary path
    const file = options.shell ? `"${command}"` : command
    const proc = spawn(file, args, {
      stdio: 'inherit',
      cwd: options.cwd,
      signal: options.signal,
      shell: options.shell,
    })

    let settled = false

    proc.on('error', (err) => {
      if (settled) return
      settled = true
      reject(err)
    })

    proc.on('close', (code) => {
      if (settled) return
      settled = true
      resolve(code)
    })
  })
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}
