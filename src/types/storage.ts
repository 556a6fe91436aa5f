/**
 * Object store interface for catalog-sync
 * Abstracts the remote side of a sync: a local directory, an in-memory
 * store, or any bucket-like service that can honour a conditional write.
 */

// =============================================================================
// Core Storage Interface
// =============================================================================

/**
 * Object store collaborator used by push, pull and clone.
 *
 * Keys are `/`-separated and relative to the store's root; a leading slash
 * is ignored.
 *
 * Implementations: MemoryBackend, FsBackend
 */
export interface ObjectStore {
  /** Backend type identifier */
  readonly type: string

  // =========================================================================
  // Read Operations
  // =========================================================================

  /**
   * Read an object together with its current ETag
   *
   * @throws ObjectNotFoundError if the key does not exist
   */
  get(key: string): Promise<StoredObject>

  /**
   * Check if an object exists
   */
  exists(key: string): Promise<boolean>

  /**
   * List keys under a prefix, sorted
   *
   * A prefix without a trailing slash matches whole path segments only:
   * `roads` matches `roads/versions.json` but not `roadside/x`.
   */
  list(prefix: string): Promise<string[]>

  // =========================================================================
  // Write Operations
  // =========================================================================

  /**
   * Write an object
   *
   * `options.ifMatch` makes the write conditional:
   * - undefined: unconditional
   * - null: the key must not exist yet
   * - string: the key's current ETag must equal it
   *
   * @throws ETagMismatchError when the condition does not hold
   */
  put(key: string, data: Uint8Array, options?: PutOptions): Promise<WriteResult>

  /**
   * Delete an object
   * @returns true if the object existed
   */
  delete(key: string): Promise<boolean>
}

// =============================================================================
// Types
// =============================================================================

export interface StoredObject {
  /** Object contents */
  data: Uint8Array
  /** Opaque version token of the contents read */
  etag: string
}

export interface PutOptions {
  /** Expected ETag (null = must not exist) */
  ifMatch?: string | null | undefined
}

export interface WriteResult {
  /** ETag of written object */
  etag: string
  /** Bytes written */
  size: number
}
