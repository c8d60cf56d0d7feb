/**
 * Server Manager
 *
 * Installation-and-lifecycle manager bound to one installation path.
 * Composes the resolver, downloader and installer for install(), the
 * process controller for lifecycle commands and the config store (through
 * the version policy) for config commands.
 */

import { mkdirSync } from 'fs'
import { resolve } from 'path'
import { modifyConfigFile } from './config-store'
import { Downloader } from './downloader'
import { logInfo } from './error-handler'
import { Installer } from './installer'
import { PasswordChanger, type PromptPort } from './password-changer'
import type { PermissionGate } from './permission-gate'
import { createPlatformAdapter, type PlatformAdapter } from './platform-adapter'
import { ProcessController, type KillFn } from './process-controller'
import type { CommandRunner } from './spawn-utils'
import { VersionCatalog, versionCatalog } from './version-catalog'
import {
  getPortPair,
  loadVersionPolicy,
  type VersionPolicy,
} from './version-policy'
import { resolveVersion } from './version-resolver'
import type {
  FetchFn,
  InstallResult,
  PasswordChangeResult,
  ProgressCallback,
  StartResult,
  StopResult,
} from '../types'

export type ServerManagerOptions = {
  adapter?: PlatformAdapter
  catalog?: VersionCatalog
  downloader?: Downloader
  downloadBaseUrl?: string
  fetchImpl?: FetchFn
  permissionGate?: PermissionGate
  runner?: CommandRunner
  kill?: KillFn
}

export class ServerManager {
  readonly path: string
  readonly adapter: PlatformAdapter
  private readonly catalog: VersionCatalog
  private readonly downloader: Downloader
  private readonly installer: Installer
  private readonly controller: ProcessController

  constructor(path: string, options: ServerManagerOptions = {}) {
    this.path = resolve(path)
    mkdirSync(this.path, { recursive: true })

    this.adapter = options.adapter ?? createPlatformAdapter()
    this.catalog = options.catalog ?? versionCatalog
    this.downloader =
      options.downloader ??
      new Downloader(this.adapter, {
        baseUrl: options.downloadBaseUrl,
        fetchImpl: options.fetchImpl,
      })
    this.installer = new Installer(this.adapter)
    this.controller = new ProcessController(this.path, {
      adapter: this.adapter,
      getPolicy: () => this.getVersionPolicy(),
      permissionGate: options.permissionGate,
      runner: options.runner,
      kill: options.kill,
    })
  }

  getVersionPolicy(): Promise<VersionPolicy> {
    return loadVersionPolicy(this.path)
  }

  async resolveVersion(edition: string): Promise<string> {
    return resolveVersion(edition.toLowerCase(), this.catalog)
  }

  /**
   * Resolve, download and extract an edition. Nothing is downloaded when
   * the server binary is already installed.
   */
  async install(
    edition: string,
    onProgress?: ProgressCallback,
  ): Promise<InstallResult> {
    const version = await this.resolveVersion(edition)
    logInfo(`Installing neo4j-${version}`, { path: this.path })

    if (this.installer.isInstalled(this.path)) {
      return { status: 'already-installed', version, path: this.path }
    }

    const archiveFile = await this.downloader.download(version, onProgress)
    const status = await this.installer.install(
      archiveFile,
      this.path,
      onProgress,
    )

    logInfo(`Neo4j installed to: ${this.path}`, { version })
    return { status, version, path: this.path }
  }

  start(wait = true): Promise<StartResult> {
    return this.controller.start(wait)
  }

  stop(timeoutMs?: number): Promise<StopResult> {
    return this.controller.stop({ timeoutMs })
  }

  console(): Promise<void> {
    return this.controller.console()
  }

  shell(): Promise<void> {
    return this.controller.shell()
  }

  info(): Promise<void> {
    return this.controller.info()
  }

  restart(): Promise<void> {
    return this.controller.restart()
  }

  reset(): Promise<void> {
    return this.controller.reset()
  }

  async setAuthEnabled(enabled: boolean): Promise<void> {
    const policy = await this.getVersionPolicy()
    await modifyConfigFile(policy.configPath, policy.authProperties(enabled))
  }

  /**
   * Point the http connector at `port` and disable https (on port - 1)
   */
  async setPort(port: number): Promise<void> {
    const ports = getPortPair(port)
    logInfo(`Config ports ${ports.http} / ${ports.https}`, { path: this.path })

    const policy = await this.getVersionPolicy()
    await modifyConfigFile(policy.configPath, policy.portProperties(port))
  }

  /**
   * Standalone credential rotation; needs no installation
   */
  static changePassword(
    prompt: PromptPort,
    options: { fetchImpl?: FetchFn } = {},
  ): Promise<PasswordChangeResult> {
    return new PasswordChanger(prompt, options).run()
  }
}
