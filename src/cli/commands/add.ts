/**
 * Add Command
 *
 * Record files as a new version of a collection.
 */

import { promises as fs } from 'node:fs'
import { relative, resolve } from 'node:path'
import { ZodError } from 'zod'
import type { ParsedArgs } from '../types'
import { print, printError, printSuccess, printWarning } from '../types'
import { catalogRootOf, reportError } from '../utils'
import { recordVersion } from '../../versioning/record'
import { parseFingerprint } from '../../schema/types'
import type { SchemaFingerprint } from '../../schema/types'
import { toHref } from '../../utils/fs-path-safety'

/**
 * Usage: catalog-sync add <collection> <file...> [--message <text>] [--schema <file.json>]
 */
export async function addCommand(parsed: ParsedArgs): Promise<number> {
  const [collection, ...files] = parsed.args
  if (!collection || files.length === 0) {
    printError('Usage: catalog-sync add <collection> <file...> [--message <text>] [--schema <file.json>]')
    return 1
  }

  const catalogRoot = catalogRootOf(parsed)

  let schema: SchemaFingerprint | undefined
  if (parsed.options.schema !== undefined) {
    const loaded = await loadSchema(parsed.options.schema)
    if (loaded === undefined) return 1
    schema = loaded
  }

  const result = await recordVersion({
    catalogRoot,
    collection,
    files: files.map(file => toHref(relative(catalogRoot, resolve(file)))),
    schema,
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
  if (report.breaking) {
    printWarning('This version contains breaking schema changes:')
    for (const change of report.breakingChanges) {
      print(`  ${change}`)
    }
  }
  for (const change of report.changes) {
    print(`  ${change}`)
  }
  return 0
}

async function loadSchema(path: string): Promise<SchemaFingerprint | undefined> {
  let raw: unknown
  try {
    raw = JSON.parse(await fs.readFile(path, 'utf-8'))
  } catch (error: unknown) {
    printError(`Cannot read schema file ${path}: ${error instanceof Error ? error.message : String(error)}`)
    return undefined
  }
  try {
    return parseFingerprint(raw)
  } catch (error: unknown) {
    if (error instanceof ZodError) {
      printError(`Invalid schema file ${path}:`)
      for (const issue of error.issues) {
        print(`  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      }
      return undefined
    }
    throw error
  }
}
