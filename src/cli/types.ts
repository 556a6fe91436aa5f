/**
 * CLI Types and Utilities
 *
 * Shared types, the argument parser and output helpers for the catalog-sync
 * CLI. Commands import from here without creating circular dependencies.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command: string
  args: string[]
  options: {
    help: boolean
    version: boolean
    /** Catalog root */
    directory: string
    verbose: boolean
    collection?: string | undefined
    force: boolean
    dryRun: boolean
    fix: boolean
    message?: string | undefined
    schema?: string | undefined
    concurrency?: string | undefined
  }
}

// =============================================================================
// Argument Parser
// =============================================================================

/**
 * Parse command line arguments
 *
 * @throws Error for unknown options or options missing their value
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: '',
    args: [],
    options: {
      help: false,
      version: false,
      directory: process.cwd(),
      verbose: false,
      force: false,
      dryRun: false,
      fix: false,
    },
  }

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index]
    if (value === undefined || value.startsWith('-')) {
      throw new Error(`Option ${flag} requires a value`)
    }
    return value
  }

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (!arg) {
      i++
      continue
    }

    // Handle flags
    if (arg.startsWith('-')) {
      switch (arg) {
        case '-h':
        case '--help':
          result.options.help = true
          break
        case '-v':
        case '--version':
          result.options.version = true
          break
        case '-d':
        case '--directory':
          result.options.directory = valueOf(arg, ++i)
          break
        case '--verbose':
          result.options.verbose = true
          break
        case '-c':
        case '--collection':
          result.options.collection = valueOf(arg, ++i)
          break
        case '--force':
          result.options.force = true
          break
        case '--dry-run':
          result.options.dryRun = true
          break
        case '--fix':
          result.options.fix = true
          break
        case '-m':
        case '--message':
          result.options.message = valueOf(arg, ++i)
          break
        case '--schema':
          result.options.schema = valueOf(arg, ++i)
          break
        case '-j':
        case '--concurrency':
          result.options.concurrency = valueOf(arg, ++i)
          break
        default:
          throw new Error(`Unknown option: ${arg}`)
      }
    } else if (!result.command) {
      // First non-option is the command
      result.command = arg
    } else {
      // Rest are command arguments
      result.args.push(arg)
    }
    i++
  }

  return result
}

// =============================================================================
// Output Utilities
// =============================================================================

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write('[ERROR] ' + message + '\n')
}

/**
 * Print a warning to stderr
 */
export function printWarning(message: string): void {
  process.stderr.write('[WARN] ' + message + '\n')
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  process.stdout.write('[OK] ' + message + '\n')
}

/**
 * Format byte size for display
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}
