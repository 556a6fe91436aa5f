/**
 * Checksum Engine
 *
 * Content hashing plus the mtime short-circuit that decides whether a
 * tracked file changed without re-reading it. The slow path (a fresh
 * SHA-256) is the source of truth; the fast path only answers "unchanged"
 * when mtime and size both match what was recorded.
 *
 * @module versioning/checksum
 */

import { promises as fs } from 'node:fs'
import type { Stats } from 'node:fs'
import { createHash } from 'node:crypto'
import { relative, resolve } from 'node:path'
import type { Asset, Ledger } from './types'
import type { SchemaFingerprint } from '../schema/types'
import { fingerprintsEqual } from '../schema/breaking'
import { latestVersion } from './ledger'
import { NotFoundError, NotRegularFileError, hasErrorCode } from '../errors'
import { resolveWithin, toHref } from '../utils/fs-path-safety'
import { CHECKSUM_CHUNK_SIZE, MTIME_TOLERANCE_SECONDS } from '../constants'
import { logger } from '../utils/logger'

// =============================================================================
// Hashing
// =============================================================================

/**
 * SHA-256 of a file, streamed in fixed-size chunks
 *
 * Symbolic links are followed.
 *
 * @throws NotFoundError if the path does not exist
 * @throws NotRegularFileError if it resolves to a directory, device, ...
 */
export async function checksum(path: string): Promise<string> {
  const resolved = await resolveRegularFile(path)
  const hash = createHash('sha256')
  const handle = await fs.open(resolved, 'r')
  try {
    const buffer = Buffer.alloc(CHECKSUM_CHUNK_SIZE)
    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, null)
      if (bytesRead === 0) break
      hash.update(buffer.subarray(0, bytesRead))
    }
  } finally {
    await handle.close()
  }
  return hash.digest('hex')
}

async function resolveRegularFile(path: string): Promise<string> {
  let resolved: string
  try {
    resolved = await fs.realpath(path)
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new NotFoundError(path)
    }
    throw error
  }
  const stat = await fs.stat(resolved)
  if (!stat.isFile()) {
    throw new NotRegularFileError(path, resolved)
  }
  return resolved
}

// =============================================================================
// Currency
// =============================================================================

export interface IsCurrentOptions {
  /** Skip the mtime fast path and always hash */
  verify?: boolean | undefined
}

/**
 * Mtime difference within tolerance
 */
export function mtimeMatches(a: number, b: number): boolean {
  return Math.abs(a - b) <= MTIME_TOLERANCE_SECONDS
}

/**
 * Whether the file at `path` still holds the content recorded in `asset`
 *
 * A missing file is not current.
 */
export async function isCurrent(path: string, asset: Asset, options: IsCurrentOptions = {}): Promise<boolean> {
  let stat: Stats
  try {
    stat = await fs.stat(path)
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) {
      return false
    }
    throw error
  }

  if (
    !options.verify &&
    asset.mtime !== undefined &&
    stat.size === asset.sizeBytes &&
    mtimeMatches(stat.mtimeMs / 1000, asset.mtime)
  ) {
    return true
  }

  return (await checksum(path)) === asset.sha256
}

/**
 * Whether the file at `relPath` (relative to the catalog root) is tracked by
 * the ledger's latest version and unchanged since
 */
export async function isTracked(
  catalogRoot: string,
  relPath: string,
  ledger: Ledger,
  options: IsCurrentOptions = {}
): Promise<boolean> {
  const latest = latestVersion(ledger)
  if (!latest) return false
  const href = toHref(relPath)
  const asset = Object.values(latest.assets).find(a => a.href === href)
  if (!asset) return false
  return isCurrent(resolveWithin(catalogRoot, asset.href), asset, options)
}

/**
 * Names of assets in the latest version whose file is missing or changed
 */
export async function findUncommittedChanges(catalogRoot: string, ledger: Ledger): Promise<string[]> {
  const latest = latestVersion(ledger)
  if (!latest) return []

  const dirty: string[] = []
  for (const [name, asset] of Object.entries(latest.assets)) {
    let current: boolean
    try {
      current = await isCurrent(resolveWithin(catalogRoot, asset.href), asset)
    } catch (error: unknown) {
      if (!(error instanceof NotRegularFileError)) {
        throw error
      }
      logger.debug(`Tracked asset ${name} is no longer a regular file`, error)
      current = false
    }
    if (!current) {
      dirty.push(name)
    }
  }
  return dirty.sort()
}

/**
 * Build an Asset for a file under the catalog root
 */
export async function describeFile(catalogRoot: string, relPath: string): Promise<Asset> {
  const fullPath = resolveWithin(catalogRoot, toHref(relPath))
  const sha256 = await checksum(fullPath)
  const stat = await fs.stat(fullPath)
  return {
    sha256,
    sizeBytes: stat.size,
    href: toHref(relative(resolve(catalogRoot), fullPath)),
    mtime: stat.mtimeMs / 1000,
  }
}

// =============================================================================
// Staleness
// =============================================================================

/**
 * Stored vs. current observations of one file
 */
export interface FileState {
  /** Null when the file was never recorded */
  storedMtime: number | null
  currentMtime: number
  storedSha256?: string | undefined
  currentSha256?: string | undefined
  storedSchema?: SchemaFingerprint | undefined
  currentSchema?: SchemaFingerprint | undefined
}

export type StalenessReason =
  | 'new_file'
  | 'mtime_unchanged'
  | 'schema_changed'
  | 'content_changed'
  | 'touched_unchanged'

export interface Staleness {
  stale: boolean
  reason: StalenessReason
}

/**
 * Classify a (stored, current) pair
 *
 * @example
 * isStale({ storedMtime: null, currentMtime: 10 })   // { stale: true, reason: 'new_file' }
 * isStale({ storedMtime: 10, currentMtime: 10 })     // { stale: false, reason: 'mtime_unchanged' }
 */
export function isStale(state: FileState): Staleness {
  if (state.storedMtime === null) {
    return { stale: true, reason: 'new_file' }
  }
  if (mtimeMatches(state.currentMtime, state.storedMtime)) {
    return { stale: false, reason: 'mtime_unchanged' }
  }
  if (state.storedSchema && state.currentSchema && !fingerprintsEqual(state.storedSchema, state.currentSchema)) {
    return { stale: true, reason: 'schema_changed' }
  }
  if (
    state.storedSha256 !== undefined &&
    state.currentSha256 !== undefined &&
    state.storedSha256 !== state.currentSha256
  ) {
    return { stale: true, reason: 'content_changed' }
  }
  return { stale: false, reason: 'touched_unchanged' }
}
