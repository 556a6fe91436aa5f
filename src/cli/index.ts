/**
 * catalog-sync CLI
 *
 * Version and synchronize dataset collections between a local catalog and a
 * remote object store.
 *
 * Commands:
 *   init            Initialize a managed catalog
 *   add             Record files as a new collection version
 *   rm              Record a version without some files
 *   log             Show a collection's version history
 *   status          Show versions, uncommitted files and remote state
 *   push            Upload local versions to a remote
 *   pull            Download remote versions
 *   sync            Pull, initialize, check and push in one step
 *   clone           Create a working copy from a remote
 *   config          Read or write settings
 */

import type { ParsedArgs } from './types'
import { parseArgs, print, printError } from './types'
import { initCommand } from './commands/init'
import { addCommand } from './commands/add'
import { rmCommand } from './commands/rm'
import { logCommand } from './commands/log'
import { statusCommand } from './commands/status'
import { pushCommand, pullCommand, syncCommand } from './commands/sync'
import { cloneCommand } from './commands/clone'
import { configCommand } from './commands/config'
import { consoleLogger, createLevelLogger, setLogger } from '../utils/logger'

// =============================================================================
// Constants
// =============================================================================

export const VERSION = '0.1.0'

export const HELP_TEXT = `
catalog-sync v${VERSION}

Version and synchronize dataset collections with a remote object store.

USAGE:
  catalog-sync <command> [options]

COMMANDS:
  init                              Initialize a managed catalog
  add <collection> <file...>        Record files as a new version
  rm <collection> <file...>         Record a version without these files
  log <collection>                  Show version history, newest first
  status [remote]                   Show versions, changes and remote state
  push [remote]                     Upload local versions to the remote
  pull [remote]                     Download remote versions
  sync [remote]                     Pull, init, scan, check and push
  clone <remote> <path>             Create a working copy from a remote
  config get <key>                  Show a resolved setting
  config set <key> <value>          Save a setting (remote, concurrency)

OPTIONS:
  -h, --help                        Show this help message
  -v, --version                     Show version number
  -d, --directory <path>            Catalog root (default: current directory)
  -c, --collection <name>           Collection to operate on
  -m, --message <text>              Version message (add, rm) or description (init)
      --schema <file.json>          Schema fingerprint for the new version (add)
  -j, --concurrency <n>             Parallel transfers (default: 4)
      --force                       Overwrite on conflict, ignore local changes
      --dry-run                     Show what would happen without changing anything
      --fix                         Convert convertible files during sync
      --verbose                     Log progress

ENVIRONMENT:
  CATALOG_SYNC_REMOTE and CATALOG_SYNC_CONCURRENCY override config.yaml;
  command line arguments override both.

EXAMPLES:
  # Record a new version of the roads collection
  catalog-sync add roads roads/data.parquet -m "2024 survey"

  # Push it to a shared directory
  catalog-sync push file:///mnt/shared/catalog -c roads

  # Get a working copy elsewhere
  catalog-sync clone file:///mnt/shared/catalog ./roads-copy -c roads
`

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Main CLI entry point
 *
 * @returns process exit code
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const parsed = parseArgs(argv)
    setLogger(createLevelLogger(parsed.options.verbose ? 'info' : 'warn', consoleLogger))

    if (parsed.options.help) {
      print(HELP_TEXT)
      return 0
    }

    if (parsed.options.version) {
      print(`catalog-sync v${VERSION}`)
      return 0
    }

    if (!parsed.command) {
      print(HELP_TEXT)
      return 0
    }

    return await dispatch(parsed)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(message)
    return 1
  }
}

async function dispatch(parsed: ParsedArgs): Promise<number> {
  switch (parsed.command) {
    case 'init':
      return initCommand(parsed)
    case 'add':
      return addCommand(parsed)
    case 'rm':
      return rmCommand(parsed)
    case 'log':
      return logCommand(parsed)
    case 'status':
      return statusCommand(parsed)
    case 'push':
      return pushCommand(parsed)
    case 'pull':
      return pullCommand(parsed)
    case 'sync':
      return syncCommand(parsed)
    case 'clone':
      return cloneCommand(parsed)
    case 'config':
      return configCommand(parsed)
    case 'help':
      print(HELP_TEXT)
      return 0
    default:
      printError(`Unknown command: ${parsed.command}`)
      print('\nRun "catalog-sync --help" for usage.')
      return 1
  }
}
