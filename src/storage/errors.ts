/**
 * Shared error classes for object store backends
 *
 * Error Hierarchy (extends CatalogError):
 * - StorageError (base class)
 *   - ObjectNotFoundError (key not found)
 *   - ETagMismatchError (conditional write failed)
 *   - PathTraversalError (key or href escapes its root)
 *
 * @module storage/errors
 */

import { CatalogError, ErrorCode } from '../errors'

// =============================================================================
// Base Storage Error
// =============================================================================

/**
 * Base error class for all object store operations.
 */
export class StorageError extends CatalogError {
  override readonly name: string = 'StorageError'
  readonly path: string | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_ERROR,
    path?: string,
    cause?: Error
  ) {
    super(message, code, { path, operation: 'storage' }, cause)
    this.path = path
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Check if this error represents a "not found" condition
   */
  isNotFound(): boolean {
    return this.code === ErrorCode.NOT_FOUND
  }

  /**
   * Check if this error represents a precondition failure (etag mismatch)
   */
  isPreconditionFailed(): boolean {
    return this.code === ErrorCode.ETAG_MISMATCH
  }
}

// =============================================================================
// Specific Storage Errors
// =============================================================================

/**
 * Error thrown when an object is not found
 */
export class ObjectNotFoundError extends StorageError {
  override readonly name = 'ObjectNotFoundError'

  constructor(path: string, cause?: Error) {
    super(`Object not found: ${path}`, ErrorCode.NOT_FOUND, path, cause)
    Object.setPrototypeOf(this, ObjectNotFoundError.prototype)
  }
}

/**
 * Error thrown when a conditional write fails due to ETag mismatch
 *
 * `expected` null means the writer expected the key to be absent;
 * `actual` null means the key is absent.
 */
export class ETagMismatchError extends StorageError {
  override readonly name = 'ETagMismatchError'
  readonly expected: string | null
  readonly actual: string | null

  constructor(path: string, expected: string | null, actual: string | null, cause?: Error) {
    super(
      `ETag mismatch for ${path}: expected ${expected ?? '(absent)'}, found ${actual ?? '(absent)'}`,
      ErrorCode.ETAG_MISMATCH,
      path,
      cause
    )
    this.expected = expected
    this.actual = actual
    Object.setPrototypeOf(this, ETagMismatchError.prototype)
  }
}

/**
 * Error thrown when a key or href would resolve outside its root directory
 */
export class PathTraversalError extends StorageError {
  override readonly name = 'PathTraversalError'

  constructor(path: string) {
    super(`Path traversal attempt detected: ${path}`, ErrorCode.PATH_TRAVERSAL, path)
    Object.setPrototypeOf(this, PathTraversalError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isObjectNotFoundError(error: unknown): error is ObjectNotFoundError {
  return error instanceof ObjectNotFoundError
}

export function isETagMismatchError(error: unknown): error is ETagMismatchError {
  return error instanceof ETagMismatchError
}
