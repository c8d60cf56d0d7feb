/**
 * Downloader
 *
 * Checks that an archive exists for a version (HEAD request, 2xx required)
 * and streams it to a private temporary file.
 */

import { randomUUID } from 'crypto'
import { createWriteStream } from 'fs'
import { rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { Readable } from 'stream'
import { pipeline } from 'stream/promises'
import { defaults } from '../config/defaults'
import {
  ErrorCodes,
  ServerManagerError,
  createArchiveUnavailableError,
  logDebug,
} from './error-handler'
import type { PlatformAdapter } from './platform-adapter'
import type { FetchFn, ProgressCallback } from '../types'

export type DownloaderOptions = {
  baseUrl?: string
  fetchImpl?: FetchFn
  // Directory the temporary archive is written to (defaults to os.tmpdir())
  tempRoot?: string
}

export class Downloader {
  private readonly baseUrl: string
  private readonly fetchImpl: FetchFn
  private readonly tempRoot: string

  constructor(
    private readonly adapter: PlatformAdapter,
    options: DownloaderOptions = {},
  ) {
    this.baseUrl = (options.baseUrl ?? defaults.downloadBaseUrl).replace(
      /\/+$/,
      '',
    )
    this.fetchImpl = options.fetchImpl ?? fetch
    this.tempRoot = options.tempRoot ?? tmpdir()
  }

  /**
   * e.g. https://dist.neo4j.org/neo4j-community-3.5.1-unix.tar.gz
   */
  getDownloadUrl(version: string): string {
    return `${this.baseUrl}/${this.getArchiveName(version)}`
  }

  getArchiveName(version: string): string {
    return `neo4j-${version}-${this.adapter.archiveSuffix}`
  }

  /**
   * @throws ARCHIVE_UNAVAILABLE unless the HEAD request answers 2xx
   */
  async checkAvailable(version: string): Promise<void> {
    const url = this.getDownloadUrl(version)
    const response = await this.fetchImpl(url, { method: 'HEAD' })
    logDebug('Archive availability', { url, status: response.status })
    if (response.status < 200 || response.status >= 300) {
      throw createArchiveUnavailableError(version, response.status)
    }
  }

  /**
   * Download the archive for a version; returns the temporary file path.
   * The caller owns the file (the installer deletes it after extraction).
   */
  async download(
    version: string,
    onProgress?: ProgressCallback,
  ): Promise<string> {
    await this.checkAvailable(version)

    const url = this.getDownloadUrl(version)
    const archiveFile = join(
      this.tempRoot,
      `neo4j-download-${randomUUID()}-${this.getArchiveName(version)}`,
    )

    onProgress?.({
      stage: 'downloading',
      message: `Downloading ${this.getArchiveName(version)}...`,
    })

    let success = false
    try {
      const response = await this.fetchImpl(url)
      if (!response.ok) {
        throw new ServerManagerError(
          ErrorCodes.DOWNLOAD_FAILED,
          `Failed to download ${url}: ${response.status} ${response.statusText}`,
          'error',
          undefined,
          { url, status: response.status },
        )
      }

      if (!response.body) {
        throw new ServerManagerError(
          ErrorCodes.DOWNLOAD_FAILED,
          `Download failed: response has no body (status ${response.status})`,
        )
      }

      // Raw bytes straight to disk, no text decoding on the way.
      // wx + 0600: a fresh file only this user can read
      const fileStream = createWriteStream(archiveFile, {
        flags: 'wx',
        mode: 0o600,
      })
      try {
        await pipeline(Readable.fromWeb(response.body), fileStream)
      } catch (pipelineError) {
        fileStream.destroy()
        throw ServerManagerError.from(pipelineError, ErrorCodes.DOWNLOAD_FAILED)
      }

      success = true
      return archiveFile
    } finally {
      if (!success) {
        await rm(archiveFile, { force: true })
      }
    }
  }
}
