/**
 * Init Command
 *
 * Turn a directory into a managed catalog:
 *   ./.catalog-sync/config.yaml  - Settings
 *   ./.catalog-sync/state.json   - Working state
 *   ./catalog.json               - Root STAC catalog (kept when present)
 */

import type { ParsedArgs } from '../types'
import { print, printSuccess } from '../types'
import { catalogRootOf, reportError } from '../utils'
import { initCatalog } from '../../catalog/state'
import { isCatalogError } from '../../errors'

/**
 * Usage: catalog-sync init [--message <description>]
 */
export async function initCommand(parsed: ParsedArgs): Promise<number> {
  const catalogRoot = catalogRootOf(parsed)
  try {
    const result = await initCatalog(catalogRoot, { description: parsed.options.message })
    if (!result.created) {
      print(`Catalog already initialized at ${catalogRoot}`)
      return 0
    }
    printSuccess(`Initialized catalog at ${catalogRoot}`)
    return 0
  } catch (error: unknown) {
    if (isCatalogError(error)) {
      reportError(error)
      return 1
    }
    throw error
  }
}
