/**
 * catalog-sync Error Handling Module
 *
 * Provides a standardized error hierarchy for the whole codebase.
 * All errors extend from CatalogError which provides:
 * - Error codes for programmatic handling
 * - Serialization support for structured (JSON) output
 * - Cause chaining for debugging
 *
 * Error Hierarchy:
 * - CatalogError (base class)
 *   - NotFoundError (file, ledger or remote not found)
 *     - RemoteNotFoundError
 *   - NotRegularFileError (checksum target is a directory, device, ...)
 *   - InvalidVersionError (malformed or non-monotonic semver)
 *   - LedgerFormatError (versions.json is not a valid ledger)
 *   - ConflictError
 *     - PushConflictError
 *     - PullConflictError
 *     - HistoryInconsistencyError
 *   - UncommittedChangesError (dirty working copy)
 *   - TransferError (asset upload/download failed)
 *   - ConfigurationError
 *   - CatalogStateError
 *   - CloneTargetNotEmptyError
 *
 * Storage errors live in storage/errors.ts and extend CatalogError as well.
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for catalog-sync operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Validation
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_VERSION = 'INVALID_VERSION',
  INVALID_FORMAT = 'INVALID_FORMAT',

  // Not found
  NOT_FOUND = 'NOT_FOUND',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  REMOTE_NOT_FOUND = 'REMOTE_NOT_FOUND',
  NOT_REGULAR_FILE = 'NOT_REGULAR_FILE',

  // Conflicts
  CONFLICT = 'CONFLICT',
  PUSH_CONFLICT = 'PUSH_CONFLICT',
  PULL_CONFLICT = 'PULL_CONFLICT',
  HISTORY_INCONSISTENT = 'HISTORY_INCONSISTENT',
  ETAG_MISMATCH = 'ETAG_MISMATCH',
  UNCOMMITTED_CHANGES = 'UNCOMMITTED_CHANGES',

  // Storage / transfer
  STORAGE_ERROR = 'STORAGE_ERROR',
  TRANSFER_FAILED = 'TRANSFER_FAILED',
  PATH_TRAVERSAL = 'PATH_TRAVERSAL',

  // Configuration and catalog lifecycle
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  CATALOG_STATE = 'CATALOG_STATE',
  TARGET_NOT_EMPTY = 'TARGET_NOT_EMPTY',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format used for JSON output
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all catalog-sync errors.
 *
 * @example
 * ```typescript
 * throw new CatalogError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'push',
 *   collection: 'roads'
 * })
 * ```
 */
export class CatalogError extends Error {
  override readonly name: string = 'CatalogError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for structured output
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof CatalogError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(data: SerializedError): CatalogError {
    const cause = data.cause ? CatalogError.fromJSON(data.cause) : undefined
    return new CatalogError(data.message, data.code, data.context, cause)
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

/**
 * Error thrown when a file or ledger does not exist.
 */
export class NotFoundError extends CatalogError {
  override readonly name: string = 'NotFoundError'
  readonly path: string

  constructor(path: string, message?: string, code: ErrorCode = ErrorCode.FILE_NOT_FOUND, cause?: Error) {
    super(message ?? `File not found: ${path}`, code, { path }, cause)
    this.path = path
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error returned when the remote holds no ledger for a collection.
 */
export class RemoteNotFoundError extends NotFoundError {
  override readonly name = 'RemoteNotFoundError'

  constructor(key: string, cause?: Error) {
    super(key, `No remote ledger found at ${key}`, ErrorCode.REMOTE_NOT_FOUND, cause)
    Object.setPrototypeOf(this, RemoteNotFoundError.prototype)
  }
}

/**
 * Error thrown when a checksum target resolves to something other than a regular file.
 */
export class NotRegularFileError extends CatalogError {
  override readonly name = 'NotRegularFileError'
  readonly path: string
  readonly resolvedPath: string

  constructor(path: string, resolvedPath: string) {
    super(
      `Not a regular file: ${path} (resolves to ${resolvedPath})`,
      ErrorCode.NOT_REGULAR_FILE,
      { path, resolvedPath }
    )
    this.path = path
    this.resolvedPath = resolvedPath
    Object.setPrototypeOf(this, NotRegularFileError.prototype)
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown for a malformed semantic version, or one that does not
 * advance past the ledger's current version.
 */
export class InvalidVersionError extends CatalogError {
  override readonly name = 'InvalidVersionError'
  readonly version: string

  constructor(version: string, reason?: string) {
    super(
      reason ? `Invalid version "${version}": ${reason}` : `Invalid version "${version}": expected MAJOR.MINOR.PATCH`,
      ErrorCode.INVALID_VERSION,
      { version }
    )
    this.version = version
    Object.setPrototypeOf(this, InvalidVersionError.prototype)
  }
}

/**
 * Error thrown when a versions.json document cannot be parsed or validated.
 */
export class LedgerFormatError extends CatalogError {
  override readonly name = 'LedgerFormatError'

  constructor(source: string, detail: string, cause?: Error) {
    super(`Invalid ledger in ${source}: ${detail}`, ErrorCode.INVALID_FORMAT, { source }, cause)
    Object.setPrototypeOf(this, LedgerFormatError.prototype)
  }
}

// =============================================================================
// Conflict Errors
// =============================================================================

/**
 * Error returned when local and remote state disagree.
 */
export class ConflictError extends CatalogError {
  override readonly name: string = 'ConflictError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFLICT,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Push refused: the remote is ahead or diverged, or changed while the push ran.
 */
export class PushConflictError extends ConflictError {
  override readonly name = 'PushConflictError'

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.PUSH_CONFLICT, context, cause)
    Object.setPrototypeOf(this, PushConflictError.prototype)
  }
}

/**
 * Pull refused: local and remote histories diverged.
 */
export class PullConflictError extends ConflictError {
  override readonly name = 'PullConflictError'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.PULL_CONFLICT, context)
    Object.setPrototypeOf(this, PullConflictError.prototype)
  }
}

/**
 * Local and remote ledgers share no common history at all.
 */
export class HistoryInconsistencyError extends ConflictError {
  override readonly name = 'HistoryInconsistencyError'

  constructor(localVersions: string[], remoteVersions: string[]) {
    super(
      `Local and remote histories share no common version (local: ${localVersions.join(', ')}; remote: ${remoteVersions.join(', ')})`,
      ErrorCode.HISTORY_INCONSISTENT,
      { localVersions, remoteVersions }
    )
    Object.setPrototypeOf(this, HistoryInconsistencyError.prototype)
  }
}

/**
 * Pull refused: tracked files were modified since the last recorded version.
 */
export class UncommittedChangesError extends CatalogError {
  override readonly name = 'UncommittedChangesError'
  readonly files: string[]

  constructor(files: string[]) {
    super(
      `Uncommitted local changes in ${files.join(', ')}`,
      ErrorCode.UNCOMMITTED_CHANGES,
      { files }
    )
    this.files = [...files]
    Object.setPrototypeOf(this, UncommittedChangesError.prototype)
  }
}

// =============================================================================
// Transfer / Configuration / Lifecycle Errors
// =============================================================================

/**
 * An asset upload or download failed.
 */
export class TransferError extends CatalogError {
  override readonly name = 'TransferError'
  readonly asset: string

  constructor(asset: string, message: string, cause?: Error) {
    super(message, ErrorCode.TRANSFER_FAILED, { asset }, cause)
    this.asset = asset
    Object.setPrototypeOf(this, TransferError.prototype)
  }
}

/**
 * Invalid or unsupported configuration.
 */
export class ConfigurationError extends CatalogError {
  override readonly name = 'ConfigurationError'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

/**
 * The catalog directory is in a state the operation cannot work with.
 */
export class CatalogStateError extends CatalogError {
  override readonly name = 'CatalogStateError'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CATALOG_STATE, context)
    Object.setPrototypeOf(this, CatalogStateError.prototype)
  }
}

/**
 * Clone target exists and is not empty.
 */
export class CloneTargetNotEmptyError extends CatalogError {
  override readonly name = 'CloneTargetNotEmptyError'

  constructor(path: string) {
    super(`Target directory is not empty: ${path}`, ErrorCode.TARGET_NOT_EMPTY, { path })
    Object.setPrototypeOf(this, CloneTargetNotEmptyError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if error is a CatalogError
 */
export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError
}

/**
 * Check if error is a ConflictError (push, pull or history)
 */
export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Wrap an unknown thrown value in a CatalogError, keeping CatalogErrors as-is
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): CatalogError {
  if (isCatalogError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new CatalogError(error.message, ErrorCode.INTERNAL, context, error)
  }
  return new CatalogError(String(error), ErrorCode.UNKNOWN, context)
}

/**
 * Narrow a Node.js system error by its errno code (ENOENT, EEXIST, ...)
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error !== null && typeof error === 'object' && 'code' in error && error.code === code
}
