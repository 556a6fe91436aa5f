/**
 * Helpers shared by CLI commands
 */

import { resolve } from 'node:path'
import type { ParsedArgs } from './types'
import { print, printError, formatBytes } from './types'
import type { ObjectStore } from '../types/storage'
import type { AssetTransfer, TransferProgress } from '../sync/types'
import { openStore } from '../storage/open'
import { resolveConcurrency, resolveSetting } from '../config'
import {
  CatalogError,
  UncommittedChangesError,
  isConflictError,
} from '../errors'

/** Hint printed after a push or sync conflict */
export const CONFLICT_HINT = 'use --force to overwrite, or pull first'

/** Hint printed when pull refuses a dirty working copy */
export const UNCOMMITTED_HINT = "commit your changes with 'catalog-sync add' or use --force"

/**
 * Catalog root from --directory, absolute
 */
export function catalogRootOf(parsed: ParsedArgs): string {
  return resolve(parsed.options.directory)
}

/**
 * --collection, or an error message and undefined
 */
export function requireCollection(parsed: ParsedArgs, command: string): string | undefined {
  const collection = parsed.options.collection
  if (!collection) {
    printError(`${command} requires --collection <name>`)
    return undefined
  }
  return collection
}

export interface RemoteTarget {
  url: string
  store: ObjectStore
}

/**
 * Remote from the positional argument, falling back to the `remote` setting
 */
export async function resolveRemote(
  parsed: ParsedArgs,
  positional: string | undefined,
  collection: string | undefined
): Promise<RemoteTarget | undefined> {
  const url = await resolveSetting('remote', {
    catalogRoot: catalogRootOf(parsed),
    collection,
    cliValue: positional,
  })
  if (url === undefined) {
    printError('No remote given and no "remote" configured (see: catalog-sync config set remote <url>)')
    return undefined
  }
  try {
    return { url, store: openStore(url) }
  } catch (error: unknown) {
    if (error instanceof CatalogError) {
      printError(error.message)
      return undefined
    }
    throw error
  }
}

/**
 * Transfer concurrency from --concurrency, env or config
 */
export async function concurrencyOf(parsed: ParsedArgs, collection: string | undefined): Promise<number> {
  return resolveConcurrency({
    catalogRoot: catalogRootOf(parsed),
    collection,
    cliValue: parsed.options.concurrency,
  })
}

/**
 * Print an executor error with guidance for the conflict and dirty cases
 */
export function reportError(error: CatalogError): void {
  printError(error.message)
  if (error instanceof UncommittedChangesError) {
    for (const file of error.files) {
      print(`  modified: ${file}`)
    }
    print(`Hint: ${UNCOMMITTED_HINT}`)
  } else if (isConflictError(error)) {
    print(`Hint: ${CONFLICT_HINT}`)
  }
}

/**
 * Progress callback for verbose transfers
 */
export function progressPrinter(enabled: boolean): ((progress: TransferProgress) => void) | undefined {
  if (!enabled) return undefined
  return progress => {
    const verb = progress.skipped ? 'skipped' : progress.direction === 'upload' ? 'uploaded' : 'downloaded'
    print(`  [${progress.completed}/${progress.total}] ${verb} ${progress.asset}`)
  }
}

/**
 * List assets with sizes (dry runs)
 */
export function printAssets(assets: readonly AssetTransfer[]): void {
  for (const asset of assets) {
    print(`  ${asset.name} (${formatBytes(asset.sizeBytes)})`)
  }
}
