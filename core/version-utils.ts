/**
 * PostgreSQL major version helpers
 *
 * Major versions are "9.6"-style before 10 and a single number afterwards.
 * They are compared segment by segment, so "10" sorts after "9.6".
 */

const MAJOR_VERSION_PATTERN = /^\d+(\.\d+)?$/

export function isValidMajorVersion(version: string): boolean {
  return MAJOR_VERSION_PATTERN.test(version)
}

/**
 * Compare two major versions.
 * Returns positive if a > b, negative if a < b, 0 if equal
 */
export function compareVersions(a: string, b: string): number {
  const partsA = a.split('.')
  const partsB = b.split('.')

  for (let i = 0; i < Math.max(partsA.length, partsB.length); i++) {
    const numA = parseInt(partsA[i] || '0', 10)
    const numB = parseInt(partsB[i] || '0', 10)
    if (numA !== numB) {
      return numA - numB
    }
  }
  return 0
}

export function isNewerVersion(versionA: string, versionB: string): boolean {
  return compareVersions(versionA, versionB) > 0
}

/**
 * True when `version` is at least the feature threshold (e.g. 9.3)
 */
export function versionAtLeast(version: string, threshold: number): boolean {
  return compareVersions(version, String(threshold)) >= 0
}

export function sortVersions(versions: Iterable<string>): string[] {
  return [...versions].sort(compareVersions)
}

/**
 * Extract the major version from a PG_VERSION file or a full server
 * version string ("16.2" -> "16", "9.6.24" -> "9.6")
 */
export function majorVersionOf(fullVersion: string): string | null {
  const trimmed = fullVersion.trim()
  const match = trimmed.match(/^(\d+)(?:\.(\d+))?/)
  if (!match) return null
  const major = parseInt(match[1], 10)
  if (major >= 10) return String(major)
  return match[2] !== undefined ? `${major}.${match[2]}` : String(major)
}
