/**
 * Storage Module
 *
 * Object stores that hold remote collections.
 *
 * Implementations:
 * - MemoryBackend: In-memory storage for testing and memory:// remotes
 * - FsBackend: Node.js filesystem, for bare paths and file:// remotes
 */

export type { ObjectStore, StoredObject, PutOptions, WriteResult } from '../types/storage'

export { MemoryBackend, getNamedMemoryBackend, clearNamedMemoryBackends } from './MemoryBackend'
export { FsBackend } from './FsBackend'
export { openStore, type OpenStoreOptions } from './open'

export {
  StorageError,
  ObjectNotFoundError,
  ETagMismatchError,
  PathTraversalError,
  isObjectNotFoundError,
  isETagMismatchError,
} from './errors'
