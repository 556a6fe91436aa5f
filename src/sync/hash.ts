import { createHash } from 'node:crypto'

/**
 * Compute SHA256 hash of data
 * @param data String or byte array to hash
 * @returns Hex-encoded hash string
 */
export function sha256(data: string | Uint8Array): string {
  const hash = createHash('sha256')
  hash.update(data)
  return hash.digest('hex')
}

/**
 * Serialize a JSON-compatible value with object keys sorted at every depth
 *
 * `undefined` object members are dropped, as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null'
  }
  if (Array.isArray(value)) {
    return `[${value.map(item => canonicalJson(item)).join(',')}]`
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`
}

/**
 * Compute deterministic hash of an object
 * Keys are sorted at every depth to ensure consistent ordering
 * @param obj Object to hash
 * @returns Hex-encoded SHA256 hash
 */
export function hashObject(obj: object): string {
  return sha256(canonicalJson(obj))
}
