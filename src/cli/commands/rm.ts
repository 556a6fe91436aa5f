/**
 * Rm Command
 *
 * Record a new version of a collection without some of its files.
 */

import { relative, resolve } from 'node:path'
import type { ParsedArgs } from '../types'
import { print, printError, printSuccess } from '../types'
import { catalogRootOf, reportError } from '../utils'
import { recordVersion } from '../../versioning/record'
import { toHref } from '../../utils/fs-path-safety'

/**
 * Usage: catalog-sync rm <collection> <file...> [--message <text>]
 *
 * The files themselves are left on disk.
 */
export async function rmCommand(parsed: ParsedArgs): Promise<number> {
  const [collection, ...files] = parsed.args
  if (!collection || files.length === 0) {
    printError('Usage: catalog-sync rm <collection> <file...> [--message <text>]')
    return 1
  }

  const catalogRoot = catalogRootOf(parsed)
  const result = await recordVersion({
    catalogRoot,
    collection,
    files: [],
    removed: files.map(file => toHref(relative(catalogRoot, resolve(file)))),
    message: parsed.options.message,
  })
  if (!result.ok) {
    reportError(result.error)
    return 1
  }

  const report = result.value
  if (!report.recorded) {
    print(`No changes to record for ${collection}`)
    return 0
  }
  printSuccess(`Recorded ${collection} ${report.version ?? ''}`)
  for (const name of report.removed) {
    print(`  removed: ${name}`)
  }
  return 0
}
