/**
 * Clone Command
 *
 * Create a working copy of a remote collection in an empty directory.
 */

import type { ParsedArgs } from '../types'
import { print, printError, printSuccess } from '../types'
import { concurrencyOf, progressPrinter, reportError, requireCollection } from '../utils'
import { clone } from '../../sync/orchestrator'
import { openStore } from '../../storage/open'
import { isCatalogError } from '../../errors'

/**
 * Usage: catalog-sync clone <remote> <path> --collection <name>
 */
export async function cloneCommand(parsed: ParsedArgs): Promise<number> {
  const [remoteUrl, localPath] = parsed.args
  if (!remoteUrl || !localPath) {
    printError('Usage: catalog-sync clone <remote> <path> --collection <name>')
    return 1
  }
  const collection = requireCollection(parsed, 'clone')
  if (!collection) return 1

  try {
    const result = await clone({
      store: openStore(remoteUrl),
      localPath,
      collection,
      remoteUrl,
      concurrency: await concurrencyOf(parsed, collection),
      onProgress: progressPrinter(parsed.options.verbose),
    })
    if (!result.ok) {
      reportError(result.error)
      return 1
    }

    const { pull } = result.value
    printSuccess(`Cloned ${collection} ${result.value.version ?? '(empty)'} into ${result.value.localPath}`)
    print(`  ${pull.filesDownloaded} file(s) downloaded, ${pull.versionsPulled.length} version(s)`)
    return 0
  } catch (error: unknown) {
    if (isCatalogError(error)) {
      reportError(error)
      return 1
    }
    throw error
  }
}
