/**
 * Semantic version helpers for ledger entries
 *
 * Versions are plain `MAJOR.MINOR.PATCH` with no pre-release or build
 * suffixes.
 *
 * @module versioning/semver
 */

import { InvalidVersionError } from '../errors'
import { INITIAL_VERSION } from '../constants'

const SEMVER_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/

export interface ParsedVersion {
  major: number
  minor: number
  patch: number
}

/**
 * Parse a version string
 *
 * @throws InvalidVersionError when the string is not MAJOR.MINOR.PATCH
 */
export function parseVersion(version: string): ParsedVersion {
  const match = SEMVER_PATTERN.exec(version)
  if (!match) {
    throw new InvalidVersionError(version)
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
  }
}

/**
 * Check a version string without throwing
 */
export function isValidVersion(version: string): boolean {
  return SEMVER_PATTERN.test(version)
}

/**
 * Numeric comparison: negative if a < b, 0 if equal, positive if a > b
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a)
  const right = parseVersion(b)
  return left.major - right.major || left.minor - right.minor || left.patch - right.patch
}

/**
 * The version that follows `current`
 *
 * The first version is 1.0.0. After that the patch number is incremented.
 * `breaking` is accepted so callers can pass what the detector found, but it
 * does not select a larger bump.
 *
 * @example
 * nextVersion(null, false)    // '1.0.0'
 * nextVersion('1.0.3', true)  // '1.0.4'
 */
export function nextVersion(current: string | null, _breaking = false): string {
  if (current === null) {
    return INITIAL_VERSION
  }
  const { major, minor, patch } = parseVersion(current)
  return `${major}.${minor}.${patch + 1}`
}
