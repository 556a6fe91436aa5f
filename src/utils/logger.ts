/**
 * Logger utility for catalog-sync
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Library code logs through the global `logger`, which
 * defaults to the noop logger; the CLI installs a leveled console logger.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Log levels, lowest first
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/**
 * Console logger implementation
 * Outputs to console with appropriate log levels
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Noop logger implementation
 * Silently discards all log messages (default for library use)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Create a logger that forwards to `target` only messages at or above `level`
 *
 * @example
 * ```typescript
 * setLogger(createLevelLogger('info'))
 * ```
 */
export function createLevelLogger(level: LogLevel, target: Logger = consoleLogger): Logger {
  const enabled = (l: LogLevel): boolean => LEVEL_ORDER[l] >= LEVEL_ORDER[level]
  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) target.debug(message, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) target.info(message, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) target.warn(message, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (enabled('error')) target.error(message, error, ...args)
    },
  }
}

/**
 * Global logger instance
 * Defaults to noopLogger
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger } from './utils/logger'
 *
 * setLogger(consoleLogger)
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}
