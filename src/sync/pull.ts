/**
 * Pull Executor
 *
 * Brings remote versions into the working copy:
 *
 * 1. Refuse to run over uncommitted local edits unless forced
 * 2. Fetch the remote ledger and plan
 * 3. Download the assets of the remote's latest version that differ locally
 * 4. Append the remote's new entries to the local ledger, written last
 *
 * Local-only history is never rewritten except by a forced pull over a
 * diverged remote, which reports what it discarded.
 *
 * @module sync/pull
 */

import { promises as fs } from 'node:fs'
import type { AssetTransfer, SyncPlan, TransferOptions } from './types'
import type { ObjectStore } from '../types/storage'
import type { Ledger } from '../versioning/types'
import { planSync, describePlan } from './planner'
import { fetchRemoteState } from './remote'
import { mapWithConcurrency } from './pool'
import { ledgerKey, objectKey } from './layout'
import { sha256 } from './hash'
import { ledgerPath, readLedgerOrEmpty, writeLedger } from '../versioning/ledger'
import { checksum, findUncommittedChanges } from '../versioning/checksum'
import {
  HistoryInconsistencyError,
  NotFoundError,
  PullConflictError,
  RemoteNotFoundError,
  TransferError,
  UncommittedChangesError,
  wrapError,
} from '../errors'
import { StorageError, isObjectNotFoundError } from '../storage/errors'
import { resolveWithin } from '../utils/fs-path-safety'
import { writeFileAtomic } from '../utils/atomic-write'
import type { CatalogResult } from '../types/result'
import { Err, Ok } from '../types/result'
import { logger } from '../utils/logger'
import { DEFAULT_TRANSFER_CONCURRENCY } from '../constants'

export type PullOptions = TransferOptions

export interface PullReport {
  plan: SyncPlan
  dryRun: boolean
  upToDate: boolean
  localAhead: boolean
  filesDownloaded: number
  filesSkipped: number
  versionsPulled: string[]
  /** Local-only versions dropped by a forced pull over a diverged remote */
  discardedVersions: string[]
  localVersionBefore: string | null
  localVersionAfter: string | null
  remoteVersion: string | null
  /** Assets that were (or, in a dry run, would be) downloaded */
  assets: AssetTransfer[]
}

/**
 * Pull a collection's remote versions into the working copy
 *
 * @example
 * ```typescript
 * const result = await pull({ catalogRoot, collection: 'roads', store })
 * if (!result.ok && result.error instanceof UncommittedChangesError) {
 *   console.error(result.error.files)
 * }
 * ```
 */
export async function pull(options: PullOptions): Promise<CatalogResult<PullReport>> {
  const { catalogRoot, collection, store } = options
  const force = options.force ?? false
  const dryRun = options.dryRun ?? false

  try {
    const path = ledgerPath(catalogRoot, collection)
    const local = await readLedgerOrEmpty(path)

    const dirty = await findUncommittedChanges(catalogRoot, local)
    if (dirty.length > 0) {
      if (!force) {
        logger.warn(`pull ${collection} refused: uncommitted changes in ${dirty.join(', ')}`)
        return Err(new UncommittedChangesError(dirty))
      }
      logger.warn(`pull ${collection}: overwriting uncommitted changes in ${dirty.join(', ')}`)
    }

    const remote = await fetchRemoteState(store, collection)
    if (!remote.exists) {
      return Err(new RemoteNotFoundError(ledgerKey(collection)))
    }

    const plan = planSync(local, remote)
    logger.info(`pull ${collection}: ${describePlan(plan)}`)

    const report: PullReport = {
      plan,
      dryRun,
      upToDate: plan.status === 'up_to_date',
      localAhead: plan.status === 'local_ahead',
      filesDownloaded: 0,
      filesSkipped: 0,
      versionsPulled: [],
      discardedVersions: [],
      localVersionBefore: local.currentVersion,
      localVersionAfter: local.currentVersion,
      remoteVersion: remote.ledger.currentVersion,
      assets: [],
    }

    if (plan.status === 'up_to_date' || plan.status === 'local_ahead') {
      return Ok(report)
    }

    if (plan.status === 'diverged') {
      if (!force) {
        logger.warn(`pull ${collection} refused: diverged`)
        return Err(conflictFor(plan))
      }
      report.discardedVersions = [...plan.localOnly]
    }

    report.assets = [...plan.toPull]
    report.versionsPulled = [...plan.remoteOnly]

    if (dryRun) {
      return Ok(report)
    }

    const counts = await downloadAssets(options, plan.toPull)
    report.filesDownloaded = counts.downloaded
    report.filesSkipped = counts.skipped

    const merged = mergeLedgers(local, remote.ledger, plan)
    await writeLedger(path, merged)
    report.localVersionAfter = merged.currentVersion
    logger.info(`pull ${collection}: local now at ${merged.currentVersion ?? '(empty)'}`)
    return Ok(report)
  } catch (error: unknown) {
    return Err(wrapError(error, { operation: 'pull', collection }))
  }
}

function conflictFor(plan: SyncPlan): PullConflictError {
  const context = {
    localVersion: plan.localVersion,
    remoteVersion: plan.remoteVersion,
    localOnly: [...plan.localOnly],
    remoteOnly: [...plan.remoteOnly],
  }
  if (plan.inconsistent) {
    const detail = new HistoryInconsistencyError([...plan.localOnly], [...plan.remoteOnly]).message
    return new PullConflictError(`${detail}: use --force to take the remote history`, context)
  }
  return new PullConflictError(`${describePlan(plan)}: use --force to take the remote history`, context)
}

/**
 * The local ledger after a pull: the shared prefix followed by the remote's
 * newer entries. A forced pull over a diverged remote takes the remote
 * history as-is.
 */
export function mergeLedgers(local: Ledger, remote: Ledger, plan: SyncPlan): Ledger {
  if (plan.status === 'diverged') {
    return { ...remote, versions: [...remote.versions] }
  }
  const versions = [
    ...local.versions.slice(0, plan.commonLength),
    ...remote.versions.slice(plan.commonLength),
  ]
  const last = versions[versions.length - 1]
  return {
    specVersion: local.specVersion,
    currentVersion: last ? last.version : null,
    versions,
  }
}

async function downloadAssets(
  options: PullOptions,
  transfers: readonly AssetTransfer[]
): Promise<{ downloaded: number; skipped: number }> {
  const { catalogRoot, collection, store, onProgress } = options
  let downloaded = 0
  let skipped = 0
  let completed = 0

  await mapWithConcurrency(transfers, options.concurrency ?? DEFAULT_TRANSFER_CONCURRENCY, async transfer => {
    const wasSkipped = await downloadAsset(store, catalogRoot, collection, transfer)
    if (wasSkipped) skipped++
    else downloaded++
    completed++
    onProgress?.({
      direction: 'download',
      asset: transfer.name,
      completed,
      total: transfers.length,
      skipped: wasSkipped,
    })
  })

  return { downloaded, skipped }
}

/**
 * Download one asset; returns true when the file on disk already matched
 */
async function downloadAsset(
  store: ObjectStore,
  catalogRoot: string,
  collection: string,
  transfer: AssetTransfer
): Promise<boolean> {
  const target = resolveWithin(catalogRoot, transfer.href)

  if (await hasContent(target, transfer.sha256)) {
    await applyMtime(target, transfer)
    logger.debug(`skip ${transfer.name}: already present`)
    return true
  }

  const key = objectKey(collection, transfer.sha256)
  let data: Uint8Array
  try {
    data = (await store.get(key)).data
  } catch (error: unknown) {
    if (isObjectNotFoundError(error)) {
      throw new TransferError(transfer.name, `Remote object for ${transfer.name} is missing: ${key}`, error)
    }
    if (error instanceof StorageError) {
      throw new TransferError(transfer.name, `Failed to download ${transfer.name}: ${error.message}`, error)
    }
    throw error
  }

  if (sha256(data) !== transfer.sha256) {
    throw new TransferError(transfer.name, `Checksum mismatch for ${transfer.name} downloaded from ${key}`)
  }

  await writeFileAtomic(target, data)
  await applyMtime(target, transfer)
  logger.debug(`downloaded ${key} -> ${transfer.href} (${data.length} bytes)`)
  return false
}

async function hasContent(path: string, expected: string): Promise<boolean> {
  try {
    return (await checksum(path)) === expected
  } catch (error: unknown) {
    if (error instanceof NotFoundError) return false
    throw error
  }
}

async function applyMtime(path: string, transfer: AssetTransfer): Promise<void> {
  if (transfer.mtime !== undefined) {
    await fs.utimes(path, transfer.mtime, transfer.mtime)
  }
}
