/**
 * Version ledger model
 *
 * One ledger per collection, persisted as `<collection>/versions.json`.
 * Entries are appended, never edited or removed, and `currentVersion`
 * always names the last entry.
 */

import type { SchemaFingerprint } from '../schema/types'

/**
 * One tracked file at a specific version
 */
export interface Asset {
  /** Hex SHA-256 of the file contents */
  sha256: string
  sizeBytes: number
  /** POSIX path relative to the catalog root */
  href: string
  /** File the asset was converted from, when it was */
  sourcePath?: string | undefined
  /** Seconds since the epoch */
  sourceMtime?: number | undefined
  /** Seconds since the epoch; drives the checksum fast path */
  mtime?: number | undefined
}

/**
 * One entry of the ledger
 */
export interface Version {
  version: string
  /** ISO-8601 UTC timestamp */
  created: string
  breaking: boolean
  schema: SchemaFingerprint
  /** Keyed by asset name (path relative to the collection directory) */
  assets: Record<string, Asset>
  /** Names of assets that are new or changed since the previous entry */
  changes: string[]
  message?: string | undefined
}

export interface Ledger {
  specVersion: string
  currentVersion: string | null
  versions: readonly Version[]
}

/**
 * Input to addVersion
 */
export interface NewVersion {
  version: string
  assets: Record<string, Asset>
  breaking: boolean
  schema: SchemaFingerprint
  message?: string | undefined
  /** Defaults to now */
  created?: string | undefined
}
