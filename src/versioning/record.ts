/**
 * Recording versions
 *
 * Turns files on disk into a new ledger entry: checksums each file, decides
 * the breaking flag from the schema diff, bumps the version and writes the
 * ledger.
 *
 * @module versioning/record
 */

import { posix } from 'node:path'
import type { Asset, Ledger } from './types'
import type { SchemaFingerprint } from '../schema/types'
import { emptyFingerprint } from '../schema/types'
import { describeChange, detectBreakingChanges, fingerprintsEqual } from '../schema/breaking'
import { addVersion, latestVersion, ledgerPath, readLedgerOrEmpty, writeLedger } from './ledger'
import { describeFile } from './checksum'
import { nextVersion } from './semver'
import { CatalogError, ErrorCode, wrapError } from '../errors'
import { PathTraversalError } from '../storage/errors'
import { hasPathTraversal, isAbsoluteHref, toHref } from '../utils/fs-path-safety'
import type { CatalogResult } from '../types/result'
import { Err, Ok } from '../types/result'
import { logger } from '../utils/logger'

export interface RecordOptions {
  catalogRoot: string
  collection: string
  /** Paths relative to the catalog root, inside the collection directory */
  files: string[]
  /** Tracked files to drop from the new version, same form as `files` */
  removed?: string[] | undefined
  /** Defaults to the previous version's schema */
  schema?: SchemaFingerprint | undefined
  message?: string | undefined
  /** Creation timestamp override */
  now?: Date | undefined
}

export interface RecordReport {
  /** False when no file or schema changed; nothing was written */
  recorded: boolean
  version: string | null
  breaking: boolean
  /** Human-readable breaking changes */
  breakingChanges: string[]
  changes: string[]
  /** Asset names dropped by this version */
  removed: string[]
}

/**
 * Record the given files as a new version of a collection
 *
 * Assets of the previous version that are not listed in `files` or
 * `removed` are carried forward unchanged.
 *
 * @example
 * ```typescript
 * const result = await recordVersion({
 *   catalogRoot: '/srv/catalog',
 *   collection: 'roads',
 *   files: ['roads/data.parquet'],
 *   message: 'Add 2024 survey',
 * })
 * ```
 */
export async function recordVersion(options: RecordOptions): Promise<CatalogResult<RecordReport>> {
  const { catalogRoot, collection } = options
  const path = ledgerPath(catalogRoot, collection)

  try {
    const ledger = await readLedgerOrEmpty(path)
    const previous = latestVersion(ledger)

    const assets: Record<string, Asset> = { ...(previous?.assets ?? {}) }
    for (const file of options.files) {
      const name = assetName(collection, file)
      assets[name] = await describeFile(catalogRoot, file)
    }
    const removed: string[] = []
    for (const file of options.removed ?? []) {
      const name = assetName(collection, file)
      if (!(name in assets)) {
        throw new CatalogError(`${file} is not tracked in ${collection}`, ErrorCode.VALIDATION_FAILED, {
          file,
          collection,
        })
      }
      delete assets[name]
      removed.push(name)
    }

    const schema = options.schema ?? previous?.schema ?? emptyFingerprint()
    const breakingChanges = previous ? detectBreakingChanges(previous.schema, schema) : []
    const breaking = breakingChanges.length > 0

    if (previous && !hasChanges(ledger, assets, schema)) {
      logger.info(`No changes to record for ${collection}`)
      return Ok({ recorded: false, version: null, breaking: false, breakingChanges: [], changes: [], removed: [] })
    }

    const next = addVersion(ledger, {
      version: nextVersion(ledger.currentVersion, breaking),
      assets,
      breaking,
      schema,
      message: options.message,
      created: (options.now ?? new Date()).toISOString(),
    })
    await writeLedger(path, next)

    const entry = latestVersion(next)
    logger.info(`Recorded ${collection} ${next.currentVersion ?? ''}${breaking ? ' (breaking)' : ''}`)
    return Ok({
      recorded: true,
      version: next.currentVersion,
      breaking,
      breakingChanges: breakingChanges.map(describeChange),
      changes: entry ? entry.changes : [],
      removed,
    })
  } catch (error: unknown) {
    return Err(wrapError(error, { operation: 'record', collection }))
  }
}

/**
 * Asset name of a catalog-relative file: its path inside the collection
 *
 * @throws CatalogError when the file is not inside the collection directory
 */
export function assetName(collection: string, file: string): string {
  const href = toHref(file)
  if (isAbsoluteHref(href) || hasPathTraversal(href)) {
    throw new PathTraversalError(file)
  }
  const normalized = posix.normalize(href)
  const prefix = `${posix.normalize(toHref(collection))}/`
  if (!normalized.startsWith(prefix) || normalized.length === prefix.length) {
    throw new CatalogError(
      `File ${file} is not inside collection ${collection}`,
      ErrorCode.VALIDATION_FAILED,
      { file, collection }
    )
  }
  return normalized.slice(prefix.length)
}

function hasChanges(ledger: Ledger, assets: Record<string, Asset>, schema: SchemaFingerprint): boolean {
  const previous = latestVersion(ledger)
  if (!previous) return true
  if (!fingerprintsEqual(previous.schema, schema)) return true
  const names = Object.keys(assets)
  if (names.length !== Object.keys(previous.assets).length) return true
  return names.some(name => previous.assets[name]?.sha256 !== assets[name]?.sha256)
}
