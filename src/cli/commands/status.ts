/**
 * Status Command
 *
 * Show a collection's current version, uncommitted files and, when a remote
 * is known, how it relates to the local history.
 */

import type { ParsedArgs } from '../types'
import { print, printWarning } from '../types'
import { catalogRootOf, reportError, requireCollection } from '../utils'
import { ledgerPath, readLedgerOrEmpty } from '../../versioning/ledger'
import { findUncommittedChanges } from '../../versioning/checksum'
import { fetchRemoteState } from '../../sync/remote'
import { describePlan, planSync } from '../../sync/planner'
import { openStore } from '../../storage/open'
import { resolveSetting } from '../../config'
import { isCatalogError } from '../../errors'

/**
 * Usage: catalog-sync status [remote] --collection <name>
 */
export async function statusCommand(parsed: ParsedArgs): Promise<number> {
  const collection = requireCollection(parsed, 'status')
  if (!collection) return 1
  const catalogRoot = catalogRootOf(parsed)

  try {
    const local = await readLedgerOrEmpty(ledgerPath(catalogRoot, collection))
    print(`Collection: ${collection}`)
    print(`Version:    ${local.currentVersion ?? '(none recorded)'}`)
    print(`Versions:   ${local.versions.length}`)

    const dirty = await findUncommittedChanges(catalogRoot, local)
    if (dirty.length > 0) {
      printWarning(`${dirty.length} uncommitted file(s):`)
      for (const file of dirty) {
        print(`  modified: ${file}`)
      }
    }

    const url = await resolveSetting('remote', { catalogRoot, collection, cliValue: parsed.args[0] })
    if (url !== undefined) {
      const remote = await fetchRemoteState(openStore(url), collection)
      const plan = planSync(local, remote)
      print(`Remote:     ${url}${remote.exists ? '' : ' (no ledger yet)'}`)
      print(describePlan(plan))
    }
    return 0
  } catch (error: unknown) {
    if (isCatalogError(error)) {
      reportError(error)
      return 1
    }
    throw error
  }
}
