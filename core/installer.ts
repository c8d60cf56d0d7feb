/**
 * Installer
 *
 * Extracts a downloaded server archive into an installation path.
 * Archives wrap everything in one top-level directory
 * (neo4j-community-3.5.1/bin, conf, lib, ...) which is flattened so the
 * installation path itself holds bin/, conf/, lib/.
 */

import { createReadStream, existsSync } from 'fs'
import { chmod, cp, mkdir, mkdtemp, readdir, rename, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import unzipper from 'unzipper'
import { paths } from '../config/paths'
import { ErrorCodes, ServerManagerError, logDebug } from './error-handler'
import { spawnAsync } from './spawn-utils'
import type { PlatformAdapter } from './platform-adapter'
import type { ProgressCallback } from '../types'

export type InstallStatus = 'installed' | 'already-installed'

/**
 * rename() fails across filesystems (EXDEV), on some Windows locks (EPERM)
 * and onto non-empty directories (ENOTEMPTY); those fall back to copy + remove.
 */
function needsCopyFallback(error: unknown): boolean {
  if (!(error instanceof Error)) return false
  const code = (error as NodeJS.ErrnoException).code
  return code === 'EXDEV' || code === 'EPERM' || code === 'ENOTEMPTY'
}

async function moveEntry(sourcePath: string, destPath: string): Promise<void> {
  try {
    await rename(sourcePath, destPath)
  } catch (error) {
    if (!needsCopyFallback(error)) throw error
    await cp(sourcePath, destPath, { recursive: true, force: true })
    await rm(sourcePath, { recursive: true, force: true })
  }
}

export class Installer {
  constructor(private readonly adapter: PlatformAdapter) {}

  /**
   * Installed means the server control script exists in bin/
   */
  isInstalled(installPath: string): boolean {
    return existsSync(this.getServerBinaryPath(installPath))
  }

  getServerBinaryPath(installPath: string): string {
    return join(paths.installation(installPath).bin, this.adapter.serverBinary)
  }

  /**
   * Extract `archiveFile` into `installPath`, then delete the archive.
   * A no-op when the server binary is already present; the archive is
   * left untouched in that case.
   */
  async install(
    archiveFile: string,
    installPath: string,
    onProgress?: ProgressCallback,
  ): Promise<InstallStatus> {
    if (this.isInstalled(installPath)) {
      return 'already-installed'
    }

    await mkdir(installPath, { recursive: true })
    const extractDir = await mkdtemp(join(tmpdir(), 'neo4j-extract-'))

    try {
      onProgress?.({ stage: 'extracting', message: 'Extracting archive...' })

      if (this.adapter.archiveFormat === 'zip') {
        await this.extractZip(archiveFile, extractDir)
      } else {
        await spawnAsync('tar', ['-xzf', archiveFile, '-C', extractDir])
      }

      await this.moveExtractedEntries(extractDir, installPath)

      if (this.adapter.archiveFormat === 'tar.gz') {
        await this.makeBinariesExecutable(installPath)
      }
    } catch (error) {
      throw new ServerManagerError(
        ErrorCodes.INSTALL_FAILED,
        `Failed to extract ${archiveFile}: ${error instanceof Error ? error.message : String(error)}`,
        'error',
        'Delete the installation directory and run install again',
        { archiveFile, installPath },
      )
    } finally {
      await rm(extractDir, { recursive: true, force: true })
    }

    await rm(archiveFile, { force: true })
    logDebug('Archive extracted', { archiveFile, installPath })

    return 'installed'
  }

  private async extractZip(zipFile: string, extractDir: string): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      createReadStream(zipFile)
        .pipe(unzipper.Extract({ path: extractDir }))
        .on('close', resolve)
        .on('error', reject)
    })
  }

  private async moveExtractedEntries(
    extractDir: string,
    installPath: string,
  ): Promise<void> {
    const entries = await readdir(extractDir, { withFileTypes: true })
    const wrapper =
      entries.length === 1 &&
      entries[0].isDirectory() &&
      entries[0].name.startsWith('neo4j')
        ? entries[0]
        : null

    const sourceDir = wrapper ? join(extractDir, wrapper.name) : extractDir
    const sourceEntries = wrapper
      ? await readdir(sourceDir)
      : entries.map((e) => e.name)

    for (const name of sourceEntries) {
      await moveEntry(join(sourceDir, name), join(installPath, name))
    }
  }

  private async makeBinariesExecutable(installPath: string): Promise<void> {
    const binDir = paths.installation(installPath).bin
    if (!existsSync(binDir)) return

    for (const binary of await readdir(binDir)) {
      await chmod(join(binDir, binary), 0o755)
    }
  }
}
