/**
 * Push Executor
 *
 * Publishes local versions to the remote, manifest-last:
 *
 * 1. Fetch the remote ledger and remember its ETag
 * 2. Plan; refuse when the remote is ahead or diverged unless forced
 * 3. Upload every asset the remote does not hold yet (content-addressed),
 *    taking each name from the newest unpushed version that lists it
 * 4. Write the ledger conditionally on the ETag from step 1
 *
 * A failure before step 4 leaves the remote ledger untouched; uploaded
 * objects are then unreferenced and harmless.
 *
 * @module sync/push
 */

import { promises as fs } from 'node:fs'
import type { SyncPlan, TransferOptions, AssetTransfer } from './types'
import type { ObjectStore } from '../types/storage'
import type { Ledger } from '../versioning/types'
import { planSync, describePlan } from './planner'
import { fetchRemoteState } from './remote'
import { mapWithConcurrency } from './pool'
import { ledgerKey, objectKey } from './layout'
import { sha256 } from './hash'
import { encodeLedger, latestVersion, ledgerPath, readLedger } from '../versioning/ledger'
import {
  HistoryInconsistencyError,
  PushConflictError,
  TransferError,
  hasErrorCode,
  wrapError,
} from '../errors'
import { isETagMismatchError } from '../storage/errors'
import { resolveWithin } from '../utils/fs-path-safety'
import type { CatalogResult } from '../types/result'
import { Err, Ok } from '../types/result'
import { logger } from '../utils/logger'
import { DEFAULT_TRANSFER_CONCURRENCY } from '../constants'

export type PushOptions = TransferOptions

export interface PushReport {
  plan: SyncPlan
  dryRun: boolean
  filesUploaded: number
  filesSkipped: number
  versionsPushed: string[]
  /** Remote-only versions dropped by a forced push */
  overwrittenVersions: string[]
  /** Assets of superseded versions whose content is no longer on disk */
  unavailable: string[]
  remoteVersionBefore: string | null
  remoteVersionAfter: string | null
  /** Assets that were (or, in a dry run, would be) uploaded */
  assets: AssetTransfer[]
}

/**
 * Push a collection's local versions to the remote store
 *
 * @example
 * ```typescript
 * const result = await push({ catalogRoot, collection: 'roads', store })
 * if (!result.ok && isConflictError(result.error)) {
 *   console.error(result.error.message)
 * }
 * ```
 */
export async function push(options: PushOptions): Promise<CatalogResult<PushReport>> {
  const { catalogRoot, collection, store } = options
  const force = options.force ?? false
  const dryRun = options.dryRun ?? false

  try {
    const local = await readLedger(ledgerPath(catalogRoot, collection))
    const remote = await fetchRemoteState(store, collection)
    const plan = planSync(local, remote)
    logger.info(`push ${collection}: ${describePlan(plan)}`)

    const report: PushReport = {
      plan,
      dryRun,
      filesUploaded: 0,
      filesSkipped: 0,
      versionsPushed: [],
      overwrittenVersions: [],
      unavailable: [],
      remoteVersionBefore: remote.ledger.currentVersion,
      remoteVersionAfter: remote.ledger.currentVersion,
      assets: [],
    }

    if (plan.status === 'up_to_date') {
      return Ok(report)
    }

    if (!force && (plan.status === 'remote_ahead' || plan.status === 'diverged')) {
      logger.warn(`push ${collection} refused: ${plan.status}`)
      return Err(conflictFor(plan))
    }

    report.assets = [...plan.toPush]
    report.versionsPushed = [...plan.localOnly]
    if (plan.remoteOnly.length > 0) {
      report.overwrittenVersions = [...plan.remoteOnly]
      logger.warn(`push ${collection}: overwriting remote version(s) ${plan.remoteOnly.join(', ')}`)
    }

    if (dryRun) {
      return Ok(report)
    }

    const current = latestVersion(local)?.assets ?? {}
    const counts = await uploadAssets(
      options,
      plan.toPush,
      transfer => current[transfer.name]?.sha256 === transfer.sha256
    )
    report.filesUploaded = counts.uploaded
    report.filesSkipped = counts.skipped
    report.unavailable = counts.unavailable

    await publishLedger(store, collection, local, remote.etag)
    report.remoteVersionAfter = local.currentVersion
    logger.info(`push ${collection}: remote now at ${local.currentVersion ?? '(empty)'}`)
    return Ok(report)
  } catch (error: unknown) {
    return Err(wrapError(error, { operation: 'push', collection }))
  }
}

function conflictFor(plan: SyncPlan): PushConflictError {
  const context = {
    status: plan.status,
    localVersion: plan.localVersion,
    remoteVersion: plan.remoteVersion,
  }
  if (plan.inconsistent) {
    const cause = new HistoryInconsistencyError([...plan.localOnly], [...plan.remoteOnly])
    return new PushConflictError(`${cause.message}: pull first or use --force`, context, cause)
  }
  if (plan.status === 'remote_ahead') {
    return new PushConflictError(
      `Remote is ahead (remote ${plan.remoteVersion ?? '(empty)'}, local ${plan.localVersion ?? '(empty)'}): pull first or use --force`,
      context
    )
  }
  return new PushConflictError(`${describePlan(plan)}: pull first or use --force`, context)
}

async function uploadAssets(
  options: PushOptions,
  transfers: readonly AssetTransfer[],
  isCurrent: (transfer: AssetTransfer) => boolean
): Promise<{ uploaded: number; skipped: number; unavailable: string[] }> {
  const { catalogRoot, collection, store, onProgress } = options
  let uploaded = 0
  let skipped = 0
  const unavailable: string[] = []
  let completed = 0

  await mapWithConcurrency(transfers, options.concurrency ?? DEFAULT_TRANSFER_CONCURRENCY, async transfer => {
    const outcome = await uploadAsset(store, catalogRoot, collection, transfer, isCurrent(transfer))
    if (outcome === 'uploaded') uploaded++
    else if (outcome === 'present') skipped++
    else unavailable.push(transfer.name)
    const wasSkipped = outcome !== 'uploaded'
    completed++
    onProgress?.({
      direction: 'upload',
      asset: transfer.name,
      completed,
      total: transfers.length,
      skipped: wasSkipped,
    })
  })

  return { uploaded, skipped, unavailable: unavailable.sort() }
}

type UploadOutcome = 'uploaded' | 'present' | 'unavailable'

/**
 * Upload one asset
 *
 * An asset dropped by a later local version (`current` false) whose file is
 * gone or changed is reported as unavailable rather than failing the push.
 */
async function uploadAsset(
  store: ObjectStore,
  catalogRoot: string,
  collection: string,
  transfer: AssetTransfer,
  current: boolean
): Promise<UploadOutcome> {
  const key = objectKey(collection, transfer.sha256)
  try {
    if (await store.exists(key)) {
      logger.debug(`skip ${transfer.name}: ${key} exists`)
      return 'present'
    }

    const data = await readAsset(catalogRoot, transfer.href)
    if (data === null || sha256(data) !== transfer.sha256) {
      if (!current) {
        logger.warn(`push ${collection}: ${transfer.name} ${transfer.sha256} is no longer in the working copy`)
        return 'unavailable'
      }
      if (data === null) {
        throw new TransferError(transfer.name, `${transfer.name} is missing from the working copy (${transfer.href})`)
      }
      throw new TransferError(
        transfer.name,
        `${transfer.name} was modified since its version was recorded; record a new version first`
      )
    }

    await store.put(key, data)
    logger.debug(`uploaded ${transfer.name} -> ${key} (${data.length} bytes)`)
    return 'uploaded'
  } catch (error: unknown) {
    if (error instanceof TransferError) throw error
    const cause = error instanceof Error ? error : undefined
    throw new TransferError(
      transfer.name,
      `Failed to upload ${transfer.name}: ${cause ? cause.message : String(error)}`,
      cause
    )
  }
}

async function readAsset(catalogRoot: string, href: string): Promise<Uint8Array | null> {
  try {
    return new Uint8Array(await fs.readFile(resolveWithin(catalogRoot, href)))
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) return null
    throw error
  }
}

async function publishLedger(
  store: ObjectStore,
  collection: string,
  ledger: Ledger,
  expectedEtag: string | null
): Promise<void> {
  try {
    await store.put(ledgerKey(collection), encodeLedger(ledger), { ifMatch: expectedEtag })
  } catch (error: unknown) {
    if (isETagMismatchError(error)) {
      logger.warn(`push ${collection}: remote ledger changed during push`)
      throw new PushConflictError(
        'Remote changed during push: pull first or use --force',
        { collection },
        error
      )
    }
    throw error
  }
}
