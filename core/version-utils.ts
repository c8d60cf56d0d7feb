/**
 * Version string helpers for server versions such as "3.5.1" or "3.0.0-M01"
 */

/**
 * Split a version into its numeric core and prerelease suffix
 *
 *   "3.0.0"     -> { core: [3, 0, 0], suffix: "" }
 *   "3.0.0-M01" -> { core: [3, 0, 0], suffix: "M01" }
 *   "2.3"       -> { core: [2, 3], suffix: "" }
 */
export function parseVersion(version: string): {
  core: number[]
  suffix: string
} | null {
  const match = version.trim().match(/^(\d+(?:\.\d+)*)(?:-([0-9A-Za-z.]+))?$/)
  if (!match) return null
  return {
    core: match[1].split('.').map((part) => parseInt(part, 10)),
    suffix: match[2] ?? '',
  }
}

/**
 * Compare the numeric cores of two versions; missing segments count as 0.
 * Returns positive if a > b, negative if a < b, 0 if equal.
 * Prerelease suffixes are ignored: "3.0.0-M01" ranks with "3.0.0".
 */
export function compareVersionCores(a: string, b: string): number {
  const parsedA = parseVersion(a)
  const parsedB = parseVersion(b)
  if (!parsedA || !parsedB) {
    throw new Error(`Cannot compare versions "${a}" and "${b}"`)
  }

  const length = Math.max(parsedA.core.length, parsedB.core.length)
  for (let i = 0; i < length; i++) {
    const diff = (parsedA.core[i] ?? 0) - (parsedB.core[i] ?? 0)
    if (diff !== 0) return diff
  }
  return 0
}

export function isAtLeast(version: string, minimum: string): boolean {
  return compareVersionCores(version, minimum) >= 0
}

// lib/neo4j-kernel-3.5.1.jar -> 3.5.1
const KERNEL_JAR_PATTERN = /^neo4j-kernel-(\d+(?:\.\d+)*(?:-[0-9A-Za-z.]+)?)\.jar$/

/**
 * Extract the server version from a kernel jar file name
 */
export function versionFromKernelJar(fileName: string): string | null {
  const match = fileName.match(KERNEL_JAR_PATTERN)
  return match ? match[1] : null
}
