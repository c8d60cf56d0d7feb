/**
 * Shared test fixtures: temporary installations and in-process stand-ins
 * for fetch, the command runner and process.kill
 */

import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import type { CommandRunner, RunOptions } from '../../core/spawn-utils'
import type { KillFn } from '../../core/process-controller'
import type { PromptPort, PromptQuestion } from '../../core/password-changer'
import type { FetchFn } from '../../types'

// Keep the manager log out of the real home directory
process.env.NEO4J_MANAGER_HOME = join(tmpdir(), 'neo4j-server-manager-tests')

export async function makeTempDir(prefix = 'neo4j-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}

export type InstallationFixture = {
  version?: string
  serverBinary?: string
  configContents?: string
}

/**
 * Lay out a fake installed server: bin/<server>, lib/neo4j-kernel-<v>.jar
 * and the config file the version calls for
 */
export async function createInstallation(
  root: string,
  fixture: InstallationFixture = {},
): Promise<void> {
  const version = fixture.version ?? '3.5.1'
  const modern = !version.startsWith('1.') && !version.startsWith('2.')

  await mkdir(join(root, 'bin'), { recursive: true })
  await mkdir(join(root, 'lib'), { recursive: true })
  await mkdir(join(root, 'conf'), { recursive: true })
  await mkdir(join(root, modern ? 'run' : 'data'), { recursive: true })

  await writeFile(
    join(root, 'bin', fixture.serverBinary ?? 'neo4j'),
    '#!/bin/sh\n',
  )
  await writeFile(join(root, 'lib', `neo4j-kernel-${version}.jar`), '')
  await writeFile(
    join(root, 'conf', modern ? 'neo4j.conf' : 'neo4j-server.properties'),
    fixture.configContents ?? '',
  )
}

export type FetchCall = {
  url: string
  method: string
  headers: Headers
  body: string | null
}

/**
 * fetch stand-in that records every call and answers through `respond`
 */
export function createFakeFetch(
  respond: (call: FetchCall) => Response | Promise<Response>,
): { fetch: FetchFn; calls: FetchCall[] } {
  const calls: FetchCall[] = []

  const fakeFetch: FetchFn = async (input, init) => {
    const url =
      typeof input === 'string'
        ? input
        : input instanceof URL
          ? input.href
          : input.url
    const call: FetchCall = {
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : null,
    }
    calls.push(call)
    return respond(call)
  }

  return { fetch: fakeFetch, calls }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

export type RunnerCall = {
  command: string
  args: string[]
  options?: RunOptions
}

/**
 * CommandRunner stand-in; `handle` decides each call's exit code
 */
export function createFakeRunner(
  handle: (call: RunnerCall) => Promise<number | null> | number | null = () =>
    0,
): { runner: CommandRunner; calls: RunnerCall[] } {
  const calls: RunnerCall[] = []

  const runner: CommandRunner = async (command, args, options) => {
    const call: RunnerCall = { command, args, options }
    calls.push(call)
    return handle(call)
  }

  return { runner, calls }
}

/**
 * Never finishes on its own; rejects like a killed child when aborted
 */
export function hangUntilAborted(
  signal: AbortSignal | undefined,
): Promise<number | null> {
  return new Promise((_resolve, reject) => {
    if (!signal) {
      reject(new Error('hangUntilAborted needs an abort signal'))
      return
    }
    signal.addEventListener(
      'abort',
      () => {
        const error = new Error('The operation was aborted')
        error.name = 'AbortError'
        reject(error)
      },
      { once: true },
    )
  })
}

export function createFakeKill(): {
  kill: KillFn
  kills: Array<{ pid: number; signal: NodeJS.Signals }>
} {
  const kills: Array<{ pid: number; signal: NodeJS.Signals }> = []
  return {
    kill: (pid, signal) => {
      kills.push({ pid, signal })
    },
    kills,
  }
}

/**
 * Prompt port that answers from a script and records what it printed
 */
export function createScriptedPrompt(answers: string[]): {
  port: PromptPort
  questions: PromptQuestion[]
  printed: string[]
} {
  const remaining = [...answers]
  const questions: PromptQuestion[] = []
  const printed: string[] = []

  return {
    port: {
      async ask(question) {
        questions.push(question)
        const answer = remaining.shift()
        if (answer === undefined) {
          throw new Error(`No scripted answer for "${question.message}"`)
        }
        return answer
      },
      print(message) {
        printed.push(message)
      },
    },
    questions,
    printed,
  }
}
