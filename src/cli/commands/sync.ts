/**
 * Sync Commands
 *
 * push, pull and sync between the working copy and a remote object store.
 */

import type { ParsedArgs } from '../types'
import { print, printError, printSuccess, printWarning } from '../types'
import {
  catalogRootOf,
  concurrencyOf,
  printAssets,
  progressPrinter,
  reportError,
  requireCollection,
  resolveRemote,
  CONFLICT_HINT,
  UNCOMMITTED_HINT,
} from '../utils'
import { UncommittedChangesError, isConflictError } from '../../errors'
import { push } from '../../sync/push'
import { pull } from '../../sync/pull'
import { sync } from '../../sync/orchestrator'
import { describePlan } from '../../sync/planner'

// =============================================================================
// Push Command
// =============================================================================

/**
 * Usage: catalog-sync push [dest] --collection <name> [--force] [--dry-run]
 */
export async function pushCommand(parsed: ParsedArgs): Promise<number> {
  const collection = requireCollection(parsed, 'push')
  if (!collection) return 1
  const remote = await resolveRemote(parsed, parsed.args[0], collection)
  if (!remote) return 1

  const result = await push({
    catalogRoot: catalogRootOf(parsed),
    collection,
    store: remote.store,
    force: parsed.options.force,
    dryRun: parsed.options.dryRun,
    concurrency: await concurrencyOf(parsed, collection),
    onProgress: progressPrinter(parsed.options.verbose),
  })
  if (!result.ok) {
    reportError(result.error)
    return 1
  }

  const report = result.value
  if (report.versionsPushed.length === 0 && report.overwrittenVersions.length === 0) {
    print('Nothing to push - local and remote are in sync')
    return 0
  }
  if (report.dryRun) {
    print(`Dry run: ${describePlan(report.plan)}`)
    if (report.overwrittenVersions.length > 0) {
      printWarning(`Would overwrite remote version(s): ${report.overwrittenVersions.join(', ')}`)
    }
    print(`Would push ${report.versionsPushed.join(', ') || '(no new versions)'} to ${remote.url} (${report.assets.length} file(s)):`)
    printAssets(report.assets)
    return 0
  }
  if (report.overwrittenVersions.length > 0) {
    printWarning(`Overwrote remote version(s): ${report.overwrittenVersions.join(', ')}`)
  }
  if (report.unavailable.length > 0) {
    printWarning(`Not uploaded, no longer in the working copy: ${report.unavailable.join(', ')}`)
  }
  printSuccess(
    `Pushed ${report.versionsPushed.length} version(s) to ${remote.url}: ` +
      `${report.filesUploaded} uploaded, ${report.filesSkipped} already present ` +
      `(remote ${report.remoteVersionBefore ?? '(empty)'} -> ${report.remoteVersionAfter ?? '(empty)'})`
  )
  return 0
}

// =============================================================================
// Pull Command
// =============================================================================

/**
 * Usage: catalog-sync pull [remote] --collection <name> [--force] [--dry-run]
 */
export async function pullCommand(parsed: ParsedArgs): Promise<number> {
  const collection = requireCollection(parsed, 'pull')
  if (!collection) return 1
  const remote = await resolveRemote(parsed, parsed.args[0], collection)
  if (!remote) return 1

  const result = await pull({
    catalogRoot: catalogRootOf(parsed),
    collection,
    store: remote.store,
    force: parsed.options.force,
    dryRun: parsed.options.dryRun,
    concurrency: await concurrencyOf(parsed, collection),
    onProgress: progressPrinter(parsed.options.verbose),
  })
  if (!result.ok) {
    reportError(result.error)
    return 1
  }

  const report = result.value
  if (report.upToDate) {
    print(`Already up to date (${report.localVersionAfter ?? '(empty)'})`)
    return 0
  }
  if (report.localAhead) {
    print(`Local is ahead of remote (${describePlan(report.plan)}); nothing to pull`)
    return 0
  }
  if (report.dryRun) {
    print(`Dry run: ${describePlan(report.plan)}`)
    print(`Would pull ${report.versionsPulled.join(', ')} from ${remote.url} (${report.assets.length} file(s)):`)
    printAssets(report.assets)
    return 0
  }
  if (report.discardedVersions.length > 0) {
    printWarning(`Discarded local version(s): ${report.discardedVersions.join(', ')}`)
  }
  printSuccess(
    `Pulled ${report.versionsPulled.length} version(s) from ${remote.url}: ` +
      `${report.filesDownloaded} downloaded, ${report.filesSkipped} already present ` +
      `(local ${report.localVersionBefore ?? '(empty)'} -> ${report.localVersionAfter ?? '(empty)'})`
  )
  return 0
}

// =============================================================================
// Sync Command
// =============================================================================

/**
 * Usage: catalog-sync sync [dest] --collection <name> [--force] [--dry-run] [--fix]
 */
export async function syncCommand(parsed: ParsedArgs): Promise<number> {
  const collection = requireCollection(parsed, 'sync')
  if (!collection) return 1
  const remote = await resolveRemote(parsed, parsed.args[0], collection)
  if (!remote) return 1

  const report = await sync({
    catalogRoot: catalogRootOf(parsed),
    collection,
    store: remote.store,
    force: parsed.options.force,
    dryRun: parsed.options.dryRun,
    fix: parsed.options.fix,
    concurrency: await concurrencyOf(parsed, collection),
    onProgress: progressPrinter(parsed.options.verbose),
  })

  for (const stage of report.stages) {
    if (stage.ok) {
      printSuccess(`${stage.stage}: ${stage.message}`)
    } else {
      printError(`${stage.stage}: ${stage.message}`)
    }
  }

  if (!report.ok) {
    const failed = report.stages.find(stage => !stage.ok)
    if (failed?.error instanceof UncommittedChangesError) {
      print(`Hint: ${UNCOMMITTED_HINT}`)
    } else if (isConflictError(failed?.error)) {
      print(`Hint: ${CONFLICT_HINT}`)
    }
    return 1
  }
  return 0
}
