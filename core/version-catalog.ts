/**
 * Fetches the remote nickname -> version catalog. The document is either a
 * JSON object or a flat `nickname: version` list:
 *
 *   latest: 3.5.1
 *   stable: 3.4.9
 *   enterprise: 3.5.1
 *
 * The document is fetched at most once per catalog instance; the shared
 * `versionCatalog` instance therefore fetches at most once per process.
 * A nickname may map to null when no version is currently published.
 */

import { defaults } from '../config/defaults'
import { ErrorCodes, ServerManagerError, logDebug } from './error-handler'
import type { FetchFn } from '../types'

export type CatalogEntries = ReadonlyMap<string, string | null>

export type VersionCatalogOptions = {
  url?: string
  fetchImpl?: FetchFn
}

// nickname: value  # optional comment
const FLAT_ENTRY = /^([A-Za-z0-9_.-]+)\s*:\s*(.*?)\s*$/

function unquote(value: string): string {
  const quoted = value.match(/^(["'])(.*)\1$/)
  return quoted ? quoted[2] : value
}

/**
 * Read a flat `key: value` document into an object; nested or list
 * syntax is rejected
 */
function parseFlatMapping(url: string, text: string): Record<string, unknown> {
  const document: Record<string, unknown> = {}

  for (const line of text.split(/\r?\n/)) {
    const content = line.replace(/(^|\s)#.*$/, '').trimEnd()
    if (content.trim() === '' || content.trim() === '---') continue

    const match = content.match(FLAT_ENTRY)
    if (!match) {
      throw new ServerManagerError(
        ErrorCodes.CATALOG_FETCH_FAILED,
        `Version catalog at ${url} has an unreadable line: ${line.trim()}`,
      )
    }

    const value = unquote(match[2])
    document[match[1]] =
      value === '' || value === '~' || value === 'null' ? null : value
  }

  return document
}

function parseDocument(url: string, text: string): unknown {
  const start = text.trimStart()
  if (!start.startsWith('{') && !start.startsWith('[')) {
    return parseFlatMapping(url, text)
  }
  try {
    return JSON.parse(text)
  } catch (error) {
    throw ServerManagerError.from(error, ErrorCodes.CATALOG_FETCH_FAILED)
  }
}

function parseCatalog(url: string, document: unknown): CatalogEntries {
  if (
    typeof document !== 'object' ||
    document === null ||
    Array.isArray(document)
  ) {
    throw new ServerManagerError(
      ErrorCodes.CATALOG_FETCH_FAILED,
      `Version catalog at ${url} is not a mapping`,
    )
  }

  const entries = new Map<string, string | null>()
  for (const [nickname, value] of Object.entries(document)) {
    if (value === null || value === undefined) {
      entries.set(nickname, null)
    } else if (typeof value === 'string' || typeof value === 'number') {
      entries.set(nickname, String(value))
    } else {
      throw new ServerManagerError(
        ErrorCodes.CATALOG_FETCH_FAILED,
        `Version catalog entry "${nickname}" is not a version string`,
        'error',
        undefined,
        { url, nickname },
      )
    }
  }
  return entries
}

export class VersionCatalog {
  private readonly url: string
  private readonly fetchImpl: FetchFn
  private entries: CatalogEntries | null = null
  private inFlight: Promise<CatalogEntries> | null = null

  constructor(options: VersionCatalogOptions = {}) {
    this.url = options.url ?? defaults.catalogUrl
    this.fetchImpl = options.fetchImpl ?? fetch
  }

  get sourceUrl(): string {
    return this.url
  }

  /**
   * Get the catalog, fetching it on first use
   */
  async getEntries(): Promise<CatalogEntries> {
    if (this.entries) {
      return this.entries
    }

    // Concurrent callers share one request
    if (this.inFlight) {
      return this.inFlight
    }

    this.inFlight = (async () => {
      try {
        logDebug('Fetching version catalog', { url: this.url })
        const response = await this.fetchImpl(this.url)
        if (!response.ok) {
          throw new ServerManagerError(
            ErrorCodes.CATALOG_FETCH_FAILED,
            `Failed to fetch version catalog ${this.url}: ${response.status}`,
            'error',
            undefined,
            { url: this.url, status: response.status },
          )
        }

        const document = parseDocument(this.url, await response.text())
        const entries = parseCatalog(this.url, document)
        this.entries = entries
        return entries
      } finally {
        this.inFlight = null
      }
    })()

    return this.inFlight
  }
}

export const versionCatalog = new VersionCatalog()
