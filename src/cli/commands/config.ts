/**
 * Config Command
 *
 * Read and write settings in .catalog-sync/config.yaml.
 */

import type { ParsedArgs } from '../types'
import { print, printError, printSuccess } from '../types'
import { catalogRootOf, reportError } from '../utils'
import { SETTING_KEYS, isSettingKey, resolveSetting, setSetting } from '../../config'
import { isCatalogError } from '../../errors'

const USAGE = 'Usage: catalog-sync config get <key> | config set <key> <value> [--collection <name>]'

/**
 * Usage: catalog-sync config get <key> | config set <key> <value> [--collection <name>]
 */
export async function configCommand(parsed: ParsedArgs): Promise<number> {
  const [action, key, value] = parsed.args
  if (!action || !key) {
    printError(USAGE)
    return 1
  }
  if (!isSettingKey(key)) {
    printError(`Unknown setting: ${key} (known: ${SETTING_KEYS.join(', ')})`)
    return 1
  }

  const catalogRoot = catalogRootOf(parsed)
  const collection = parsed.options.collection

  try {
    switch (action) {
      case 'get': {
        const resolved = await resolveSetting(key, { catalogRoot, collection })
        if (resolved === undefined) {
          printError(`${key} is not set`)
          return 1
        }
        print(resolved)
        return 0
      }
      case 'set': {
        if (value === undefined) {
          printError(USAGE)
          return 1
        }
        await setSetting(catalogRoot, key, value, { collection })
        printSuccess(`Set ${key} = ${value}${collection !== undefined ? ` for ${collection}` : ''}`)
        return 0
      }
      default:
        printError(USAGE)
        return 1
    }
  } catch (error: unknown) {
    if (isCatalogError(error)) {
      reportError(error)
      return 1
    }
    throw error
  }
}
