/**
 * MemoryBackend - In-memory implementation of ObjectStore
 *
 * Used for tests and for `memory://` remotes within a single process.
 */

import type { ObjectStore, PutOptions, StoredObject, WriteResult } from '../types/storage'
import { generateEtag, keyMatchesPrefix, normalizeKey } from './utils'
import { ObjectNotFoundError, ETagMismatchError } from './errors'

/** Stored object entry */
interface ObjectEntry {
  data: Uint8Array
  etag: string
}

/**
 * In-memory object store
 */
export class MemoryBackend implements ObjectStore {
  readonly type = 'memory'

  /** In-memory storage for objects */
  private objects = new Map<string, ObjectEntry>()

  /** Monotonic write counter, folded into every ETag */
  private generation = 0

  /**
   * Read an object and its ETag
   */
  async get(key: string): Promise<StoredObject> {
    key = normalizeKey(key)
    const entry = this.objects.get(key)
    if (!entry) {
      throw new ObjectNotFoundError(key)
    }
    // Return a copy to prevent external mutation
    return { data: new Uint8Array(entry.data), etag: entry.etag }
  }

  /**
   * Check if object exists
   */
  async exists(key: string): Promise<boolean> {
    return this.objects.has(normalizeKey(key))
  }

  /**
   * List keys under a prefix
   */
  async list(prefix: string): Promise<string[]> {
    prefix = normalizeKey(prefix)
    const keys: string[] = []
    for (const key of this.objects.keys()) {
      if (keyMatchesPrefix(key, prefix)) {
        keys.push(key)
      }
    }
    return keys.sort()
  }

  /**
   * Write object, optionally conditional on the current ETag
   */
  async put(key: string, data: Uint8Array, options: PutOptions = {}): Promise<WriteResult> {
    key = normalizeKey(key)
    const existing = this.objects.get(key)

    if (options.ifMatch === null && existing) {
      throw new ETagMismatchError(key, null, existing.etag)
    }
    if (typeof options.ifMatch === 'string' && existing?.etag !== options.ifMatch) {
      throw new ETagMismatchError(key, options.ifMatch, existing?.etag ?? null)
    }

    const etag = generateEtag(data, ++this.generation)
    this.objects.set(key, { data: new Uint8Array(data), etag })
    return { etag, size: data.length }
  }

  /**
   * Delete object
   */
  async delete(key: string): Promise<boolean> {
    return this.objects.delete(normalizeKey(key))
  }

  /**
   * Number of stored objects
   */
  get size(): number {
    return this.objects.size
  }
}

// =============================================================================
// Named stores for memory:// URLs
// =============================================================================

const namedStores = new Map<string, MemoryBackend>()

/**
 * Get (or create) the process-wide MemoryBackend registered under `name`
 */
export function getNamedMemoryBackend(name: string): MemoryBackend {
  let store = namedStores.get(name)
  if (!store) {
    store = new MemoryBackend()
    namedStores.set(name, store)
  }
  return store
}

/**
 * Drop every named MemoryBackend (test isolation)
 */
export function clearNamedMemoryBackends(): void {
  namedStores.clear()
}
