/**
 * Sync Orchestrator
 *
 * `sync` runs pull -> init -> scan -> check -> push as one fail-fast
 * operation. Every stage outcome, including thrown errors, is captured as a
 * StageResult so the caller sees partial completion ("pull ok, push
 * conflict") rather than an exception.
 *
 * `clone` creates a fresh working copy from a remote.
 *
 * @module sync/orchestrator
 */

import { promises as fs } from 'node:fs'
import { resolve } from 'node:path'
import type { TransferOptions } from './types'
import type { ObjectStore } from '../types/storage'
import { pull } from './pull'
import type { PullReport } from './pull'
import { push } from './push'
import type { PushReport } from './push'
import { CatalogState, detectCatalogState, initCatalog } from '../catalog/state'
import type { CheckReport, Checker, Scanner } from '../catalog/scan'
import { directoryScanner, extensionChecker } from '../catalog/scan'
import { setSetting } from '../config'
import {
  CatalogError,
  CloneTargetNotEmptyError,
  ErrorCode,
  NotFoundError,
  RemoteNotFoundError,
  hasErrorCode,
  wrapError,
} from '../errors'
import type { CatalogResult } from '../types/result'
import { Err, Ok } from '../types/result'
import { logger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

export type SyncStage = 'pull' | 'init' | 'scan' | 'check' | 'push'

export interface StageResult {
  stage: SyncStage
  ok: boolean
  message: string
  /** Set when the stage failed */
  error?: CatalogError | undefined
}

export interface SyncOptions extends TransferOptions {
  /** Convert convertible files during check */
  fix?: boolean | undefined
  scanner?: Scanner | undefined
  checker?: Checker | undefined
}

export interface SyncReport {
  ok: boolean
  stages: StageResult[]
  failedStage?: SyncStage | undefined
  pull?: PullReport | undefined
  push?: PushReport | undefined
  check?: CheckReport | undefined
  initialized: boolean
}

interface StageOutcome {
  ok: boolean
  message: string
  error?: CatalogError | undefined
}

// =============================================================================
// Sync
// =============================================================================

/**
 * Pull, initialize if needed, scan, check, then push
 *
 * @example
 * ```typescript
 * const report = await sync({ catalogRoot, collection: 'roads', store })
 * for (const stage of report.stages) {
 *   console.log(stage.stage, stage.ok ? 'ok' : 'failed', stage.message)
 * }
 * ```
 */
export async function sync(options: SyncOptions): Promise<SyncReport> {
  const { catalogRoot, collection } = options
  const force = options.force ?? false
  const dryRun = options.dryRun ?? false
  const scanner = options.scanner ?? directoryScanner
  const checker = options.checker ?? extensionChecker

  const report: SyncReport = { ok: true, stages: [], initialized: false }
  let files: string[] = []

  const run = async (stage: SyncStage, fn: () => Promise<StageOutcome>): Promise<boolean> => {
    logger.info(`sync ${collection}: ${stage}`)
    let outcome: StageOutcome
    try {
      outcome = await fn()
    } catch (error: unknown) {
      const wrapped = wrapError(error, { stage })
      outcome = { ok: false, message: `${capitalize(stage)} failed: ${wrapped.message}`, error: wrapped }
    }
    report.stages.push(
      outcome.ok
        ? { stage, ok: true, message: outcome.message }
        : { stage, ok: false, message: outcome.message, error: outcome.error }
    )
    if (!outcome.ok) {
      report.ok = false
      report.failedStage = stage
      logger.warn(`sync ${collection}: ${stage} failed: ${outcome.message}`)
    }
    return outcome.ok
  }

  const stages: Array<[SyncStage, () => Promise<StageOutcome>]> = [
    ['pull', async () => {
      const result = await pull(options)
      if (!result.ok) {
        if (result.error instanceof RemoteNotFoundError) {
          return { ok: true, message: 'No remote catalog found (first sync)' }
        }
        return { ok: false, message: `Pull failed: ${result.error.message}`, error: result.error }
      }
      report.pull = result.value
      return { ok: true, message: describePull(result.value) }
    }],
    ['init', async () => {
      const state = await detectCatalogState(catalogRoot)
      if (state === CatalogState.MANAGED) {
        return { ok: true, message: 'Catalog already initialized' }
      }
      if (state === CatalogState.UNMANAGED_STAC) {
        if (force) {
          logger.warn(`${catalogRoot} is an unmanaged STAC catalog; continuing with --force`)
          return { ok: true, message: 'Unmanaged STAC catalog, continuing with --force' }
        }
        return {
          ok: false,
          message: 'Catalog appears to be an unmanaged STAC catalog; use --force to sync anyway',
        }
      }
      if (dryRun) {
        return { ok: true, message: 'Would initialize catalog' }
      }
      await initCatalog(catalogRoot)
      report.initialized = true
      return { ok: true, message: 'Initialized catalog' }
    }],
    ['scan', async () => {
      files = await scanner.scan(catalogRoot)
      return { ok: true, message: `Found ${files.length} file(s)` }
    }],
    ['check', async () => {
      const check = await checker.check(catalogRoot, files, { fix: options.fix, dryRun })
      report.check = check
      return { ok: true, message: describeCheck(check, options.fix ?? false) }
    }],
    ['push', async () => {
      const result = await push(options)
      if (!result.ok) {
        if (result.error instanceof NotFoundError && result.error.is(ErrorCode.NOT_FOUND)) {
          return { ok: true, message: 'Nothing to push: no versions recorded' }
        }
        return { ok: false, message: `Push failed: ${result.error.message}`, error: result.error }
      }
      report.push = result.value
      return { ok: true, message: describePush(result.value) }
    }],
  ]

  for (const [stage, fn] of stages) {
    if (!(await run(stage, fn))) break
  }
  return report
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}

function describePull(report: PullReport): string {
  if (report.upToDate) return 'Already up to date with remote'
  if (report.localAhead) return 'Local is ahead of remote'
  if (report.dryRun) return `Would pull ${report.versionsPulled.length} version(s), ${report.assets.length} file(s)`
  return `Pulled ${report.versionsPulled.length} version(s), ${report.filesDownloaded} file(s)`
}

function describePush(report: PushReport): string {
  const overwritten = report.overwrittenVersions
  if (report.versionsPushed.length === 0 && overwritten.length === 0) {
    return 'Nothing to push - local and remote are in sync'
  }
  if (report.dryRun) {
    const suffix = overwritten.length > 0 ? `, would overwrite remote ${overwritten.join(', ')}` : ''
    return `Would push ${report.versionsPushed.length} version(s), ${report.assets.length} file(s)${suffix}`
  }
  const suffix = overwritten.length > 0 ? `, overwrote remote ${overwritten.join(', ')}` : ''
  return `Pushed ${report.versionsPushed.length} version(s), ${report.filesUploaded} file(s)${suffix}`
}

function describeCheck(check: CheckReport, fix: boolean): string {
  const parts = [`${check.cloudNative.length} cloud-native`]
  if (check.convertible.length > 0) {
    if (fix && check.fixed.length > 0) {
      parts.push(`${check.fixed.length} converted`)
    } else if (fix) {
      parts.push(`${check.convertible.length} convertible (no converter available)`)
    } else {
      parts.push(`${check.convertible.length} convertible (use --fix to convert)`)
    }
  }
  if (check.unsupported.length > 0) {
    logger.warn(`${check.unsupported.length} unsupported file(s): ${check.unsupported.join(', ')}`)
    parts.push(`${check.unsupported.length} unsupported`)
  }
  return parts.join(', ')
}

// =============================================================================
// Clone
// =============================================================================

export interface CloneOptions {
  store: ObjectStore
  localPath: string
  collection: string
  /** Recorded as the clone's `remote` setting and in its title */
  remoteUrl?: string | undefined
  concurrency?: number | undefined
  onProgress?: TransferOptions['onProgress']
}

export interface CloneReport {
  localPath: string
  version: string | null
  pull: PullReport
}

/**
 * Create a working copy of a remote collection in an empty directory
 *
 * @example
 * ```typescript
 * const result = await clone({ store, localPath: './roads-copy', collection: 'roads' })
 * ```
 */
export async function clone(options: CloneOptions): Promise<CatalogResult<CloneReport>> {
  const localPath = resolve(options.localPath)
  try {
    if (!(await isEmptyOrMissing(localPath))) {
      return Err(new CloneTargetNotEmptyError(localPath))
    }

    await fs.mkdir(localPath, { recursive: true })
    await initCatalog(localPath, { title: `Clone of ${options.remoteUrl ?? options.store.type}` })
    if (options.remoteUrl !== undefined) {
      await setSetting(localPath, 'remote', options.remoteUrl)
    }

    const result = await pull({
      catalogRoot: localPath,
      collection: options.collection,
      store: options.store,
      force: false,
      concurrency: options.concurrency,
      onProgress: options.onProgress,
    })
    if (!result.ok) {
      return result
    }
    return Ok({ localPath, version: result.value.localVersionAfter, pull: result.value })
  } catch (error: unknown) {
    return Err(wrapError(error, { operation: 'clone', localPath }))
  }
}

async function isEmptyOrMissing(path: string): Promise<boolean> {
  try {
    return (await fs.readdir(path)).length === 0
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) return true
    throw error
  }
}
