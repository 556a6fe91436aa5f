/**
 * Random suffixes for temporary file names
 *
 * @module utils/random
 */

import { randomBytes } from 'node:crypto'

/**
 * Generate a random base-36 string of the given length
 *
 * @example
 * ```typescript
 * getRandomBase36(10) // e.g. 'k3j9x0a1zq'
 * ```
 */
export function getRandomBase36(length: number): string {
  const bytes = randomBytes(length)
  let out = ''
  for (const byte of bytes) {
    out += (byte % 36).toString(36)
  }
  return out
}

/**
 * Build a sibling temp path for an atomic write of `path`
 */
export function tempPathFor(path: string): string {
  return `${path}.tmp.${Date.now()}.${getRandomBase36(10)}`
}
