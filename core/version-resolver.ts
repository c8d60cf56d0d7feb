import {
  createNicknameHasNoVersionError,
  createUnknownNicknameError,
  logInfo,
} from './error-handler'
import type { VersionCatalog } from './version-catalog'

// Final hyphen-delimited segment made only of letters, e.g. "latest" in
// "community-latest". Anything containing a digit is a literal version.
const NICKNAME_SUFFIX = /(^|-)([a-z]+)$/

/**
 * Split an edition string into the part kept as-is and a nickname candidate.
 * Returns null when the string is a literal version.
 */
export function splitNickname(
  edition: string,
): { prefix: string; nickname: string } | null {
  const match = edition.match(NICKNAME_SUFFIX)
  if (!match || match.index === undefined) return null
  return {
    prefix: edition.slice(0, match.index) + match[1],
    nickname: match[2],
  }
}

/**
 * Turn an edition string into a concrete version string.
 *
 *   "community-latest"  -> "community-3.5.1"   (catalog lookup)
 *   "enterprise"        -> catalog["enterprise"]
 *   "community-3.5.1"   -> "community-3.5.1"   (no network access)
 *
 * @throws UNKNOWN_NICKNAME when the nickname is not a catalog key
 * @throws NICKNAME_HAS_NO_VERSION when the key maps to no version
 */
export async function resolveVersion(
  edition: string,
  catalog: VersionCatalog,
): Promise<string> {
  const split = splitNickname(edition)
  if (!split) {
    return edition
  }

  const { prefix, nickname } = split
  logInfo(`Retrieving ${nickname} version...`, { edition })

  const entries = await catalog.getEntries()
  if (!entries.has(nickname)) {
    throw createUnknownNicknameError(nickname)
  }

  const version = entries.get(nickname)
  if (version === null || version === undefined) {
    throw createNicknameHasNoVersionError(nickname)
  }

  logInfo(`${nickname} version is: ${version}`, { edition })
  return `${prefix}${version}`
}
