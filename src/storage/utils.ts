/**
 * Shared helpers for object store backends
 *
 * @module storage/utils
 */

/**
 * FNV-1a hash of a byte array, as 8 hex digits
 *
 * Fast and non-cryptographic; used only for change detection.
 */
export function fnv1a(data: Uint8Array): string {
  let hash = 2166136261 // FNV offset basis
  for (const byte of data) {
    hash ^= byte
    hash = Math.imul(hash, 16777619) >>> 0 // FNV prime, keep as unsigned 32-bit
  }
  return hash.toString(16).padStart(8, '0')
}

/**
 * Generate an ETag from data content and a write generation
 *
 * The generation makes every write produce a fresh ETag even when the
 * bytes are identical, so an overwrite with the same content still
 * invalidates a previously observed ETag.
 *
 * @example
 * ```typescript
 * generateEtag(new Uint8Array([1, 2, 3]), 7) // '"<fnv>-7"'
 * ```
 */
export function generateEtag(data: Uint8Array, generation: number): string {
  return `"${fnv1a(data)}-${generation.toString(36)}"`
}

/**
 * Normalize an object key by removing leading slashes
 *
 * @example
 * ```typescript
 * normalizeKey('/roads/versions.json')  // 'roads/versions.json'
 * normalizeKey('roads/versions.json')   // 'roads/versions.json'
 * normalizeKey('/')                     // ''
 * ```
 */
export function normalizeKey(key: string): string {
  return key.replace(/^\/+/, '')
}

/**
 * Test whether `key` falls under `prefix`, matching whole path segments
 *
 * @example
 * ```typescript
 * keyMatchesPrefix('roads/versions.json', 'roads')   // true
 * keyMatchesPrefix('roadside/a.txt', 'roads')        // false
 * keyMatchesPrefix('roads/versions.json', 'roads/')  // true
 * ```
 */
export function keyMatchesPrefix(key: string, prefix: string): boolean {
  if (prefix.length === 0) return true
  if (!key.startsWith(prefix)) return false
  if (prefix.endsWith('/')) return true
  const next = key[prefix.length]
  return next === undefined || next === '/'
}
