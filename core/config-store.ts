/**
 * Config Store
 *
 * Round-trips a line-oriented `key=value` property file. The file is held
 * as an ordered list of line records; only records whose key is being set
 * are replaced, every other line is written back exactly as read
 * (whitespace, comments, CRLF endings and ordering included).
 */

import { readFile, writeFile } from 'fs/promises'
import { createConfigError, logDebug } from './error-handler'
import type { ConfigProperties } from '../types'

export type ConfigLine = {
  // Line text without its terminator
  raw: string
  // "\r" for CRLF lines, otherwise ""
  carriageReturn: string
  // Property name when the line (optionally commented out) is `key = value`
  key: string | null
}

// Optional indentation, optional "#", key, "=", anything
const PROPERTY_LINE = /^\s*(?:#\s*)?([^\s#=]+)\s*=/

export function parseConfigLine(text: string): ConfigLine {
  const carriageReturn = text.endsWith('\r') ? '\r' : ''
  const raw = carriageReturn ? text.slice(0, -1) : text
  const match = raw.match(PROPERTY_LINE)
  return { raw, carriageReturn, key: match ? match[1] : null }
}

export function parseConfig(contents: string): ConfigLine[] {
  return contents.split('\n').map(parseConfigLine)
}

export function serializeConfig(lines: ConfigLine[]): string {
  return lines.map((line) => line.raw + line.carriageReturn).join('\n')
}

/**
 * For each property, replace the first line carrying that key with
 * `name=value` (uncommenting it). Properties that appear nowhere in the
 * file are not added.
 */
export function applyProperties(
  lines: ConfigLine[],
  properties: ConfigProperties,
): ConfigLine[] {
  const result = [...lines]

  for (const [name, value] of Object.entries(properties)) {
    const index = result.findIndex((line) => line.key === name)
    if (index === -1) {
      logDebug('Config property not present, skipping', { property: name })
      continue
    }
    result[index] = {
      raw: `${name}=${String(value)}`,
      carriageReturn: result[index].carriageReturn,
      key: name,
    }
  }

  return result
}

export function modifyConfigContents(
  contents: string,
  properties: ConfigProperties,
): string {
  return serializeConfig(applyProperties(parseConfig(contents), properties))
}

/**
 * Read the whole file, rewrite the requested keys, write the whole file back.
 * latin1 maps every byte to one character, so bytes on untouched lines are
 * written back as read whatever their encoding.
 *
 * @throws CONFIG_ERROR when the file cannot be read or written
 */
export async function modifyConfigFile(
  configPath: string,
  properties: ConfigProperties,
): Promise<void> {
  let contents: string
  try {
    contents = await readFile(configPath, 'latin1')
  } catch (error) {
    throw createConfigError(configPath, error)
  }

  const updated = modifyConfigContents(contents, properties)

  try {
    await writeFile(configPath, updated, 'latin1')
  } catch (error) {
    throw createConfigError(configPath, error)
  }
}
