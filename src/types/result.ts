/**
 * Result Type for Type-Safe Error Handling
 *
 * Push, pull, clone and record return a Result instead of throwing, so a
 * caller (the sync orchestrator in particular) sees every protocol-level
 * failure in the type of the value it gets back.
 *
 * @example
 * ```typescript
 * const result = await push({ catalogRoot, collection, store })
 * if (isOk(result)) {
 *   console.log(result.value.versionsPushed)
 * } else {
 *   console.log(result.error.message)
 * }
 * ```
 */

import type { CatalogError } from '../errors'

// =============================================================================
// Core Result Type
// =============================================================================

/**
 * A discriminated union representing either a successful result (Ok) or a failure (Err).
 *
 * @typeParam T - The type of the success value
 * @typeParam E - The type of the error (defaults to Error)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/** What every executor resolves to */
export type CatalogResult<T> = Result<T, CatalogError>

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing the given value.
 */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result containing the given error.
 */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error })

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a Result is in the Ok (success) state.
 */
export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok === true
}

/**
 * Type guard to check if a Result is in the Err (failure) state.
 */
export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return result.ok === false
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Extracts the value from an Ok Result, or throws the error if Err.
 *
 * @throws The error if the Result is Err
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value
  }
  throw result.error
}

/**
 * Maps the value of an Ok Result, passing Err through unchanged.
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  if (isOk(result)) {
    return Ok(fn(result.value))
  }
  return result
}
