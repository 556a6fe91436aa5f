/**
 * Log Command
 *
 * Show a collection's version history, newest first.
 */

import type { ParsedArgs } from '../types'
import { print, printError } from '../types'
import { catalogRootOf, reportError } from '../utils'
import { ledgerPath, readLedgerOrEmpty } from '../../versioning/ledger'
import type { Version } from '../../versioning/types'
import { isCatalogError } from '../../errors'

/**
 * Usage: catalog-sync log [collection] [--collection <name>]
 */
export async function logCommand(parsed: ParsedArgs): Promise<number> {
  const collection = parsed.args[0] ?? parsed.options.collection
  if (!collection) {
    printError('log requires a collection: catalog-sync log <collection>')
    return 1
  }

  try {
    const ledger = await readLedgerOrEmpty(ledgerPath(catalogRootOf(parsed), collection))
    if (ledger.versions.length === 0) {
      print(`No versions recorded for ${collection}`)
      return 0
    }
    for (const version of [...ledger.versions].reverse()) {
      print(formatVersion(version, version.version === ledger.currentVersion))
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

/**
 * One history entry
 *
 * @example
 * formatVersion(v, true)
 * // '1.0.1 (current) 2024-03-01T00:00:00.000Z\n    Add survey\n    changed: data.parquet'
 */
export function formatVersion(version: Version, current: boolean): string {
  const flags = [current ? 'current' : '', version.breaking ? 'breaking' : ''].filter(Boolean)
  const lines = [`${version.version}${flags.length > 0 ? ` (${flags.join(', ')})` : ''} ${version.created}`]
  if (version.message) {
    lines.push(`    ${version.message}`)
  }
  for (const name of version.changes) {
    lines.push(`    changed: ${name}`)
  }
  return lines.join('\n')
}
