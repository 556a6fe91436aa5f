/**
 * FsBackend - Node.js filesystem implementation of ObjectStore
 *
 * Serves `file://` remotes (a shared directory, a mounted bucket).
 * Uses node:fs/promises with support for:
 * - Atomic writes (write to .tmp then rename)
 * - Conditional writes gated by a content-hash ETag under a lock file
 * - Path traversal prevention for every key
 */

import { promises as fs } from 'node:fs'
import type { Dirent } from 'node:fs'
import type { FileHandle } from 'node:fs/promises'
import { join, relative, resolve } from 'node:path'
import { logger } from '../utils/logger'
import type { ObjectStore, PutOptions, StoredObject, WriteResult } from '../types/storage'
import { ObjectNotFoundError, ETagMismatchError } from './errors'
import { STALE_LOCK_AGE_MS, LOCK_MAX_RETRIES, LOCK_BASE_DELAY_MS } from '../constants'
import { keyMatchesPrefix, normalizeKey } from './utils'
import { resolveWithin, toHref } from '../utils/fs-path-safety'
import { writeFileAtomic } from '../utils/atomic-write'
import { hasErrorCode } from '../errors'
import { sha256 } from '../sync/hash'

/** Suffixes of in-flight bookkeeping files that list() never reports */
const LOCK_SUFFIX = '.lock'
const TEMP_PATTERN = /\.tmp\.\d+\.[a-z0-9]+$/

/**
 * Node.js filesystem object store
 */
export class FsBackend implements ObjectStore {
  readonly type = 'fs'
  private readonly resolvedRootPath: string

  /**
   * Create a new FsBackend
   * @param rootPath - The root directory for all keys
   */
  constructor(public readonly rootPath: string) {
    this.resolvedRootPath = resolve(rootPath)
  }

  /**
   * Resolve and validate a key, preventing path traversal
   */
  private resolveKey(key: string): string {
    return resolveWithin(this.resolvedRootPath, normalizeKey(key))
  }

  /**
   * Generate an ETag from stored bytes
   */
  private generateEtag(data: Uint8Array): string {
    return `"${sha256(data).slice(0, 32)}"`
  }

  async get(key: string): Promise<StoredObject> {
    const fullPath = this.resolveKey(key)
    try {
      const data = new Uint8Array(await fs.readFile(fullPath))
      return { data, etag: this.generateEtag(data) }
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'EISDIR')) {
        throw new ObjectNotFoundError(key)
      }
      throw error
    }
  }

  async exists(key: string): Promise<boolean> {
    const fullPath = this.resolveKey(key)
    try {
      const stat = await fs.stat(fullPath)
      return stat.isFile()
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false
      }
      throw error
    }
  }

  async list(prefix: string): Promise<string[]> {
    prefix = normalizeKey(prefix)
    const keys: string[] = []

    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[]
      try {
        entries = await fs.readdir(dir, { withFileTypes: true })
      } catch (error: unknown) {
        if (hasErrorCode(error, 'ENOENT')) return
        throw error
      }
      for (const entry of entries) {
        const fullPath = join(dir, entry.name)
        if (entry.isDirectory()) {
          await walk(fullPath)
        } else if (entry.isFile() && !entry.name.endsWith(LOCK_SUFFIX) && !TEMP_PATTERN.test(entry.name)) {
          const key = toHref(relative(this.resolvedRootPath, fullPath))
          if (keyMatchesPrefix(key, prefix)) {
            keys.push(key)
          }
        }
      }
    }

    await walk(this.resolvedRootPath)
    return keys.sort()
  }

  async put(key: string, data: Uint8Array, options: PutOptions = {}): Promise<WriteResult> {
    const fullPath = this.resolveKey(key)
    if (options.ifMatch === undefined) {
      await writeFileAtomic(fullPath, data)
      return { etag: this.generateEtag(data), size: data.length }
    }
    return this.putConditional(key, fullPath, data, options.ifMatch)
  }

  async delete(key: string): Promise<boolean> {
    const fullPath = this.resolveKey(key)
    try {
      await fs.unlink(fullPath)
      return true
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false
      }
      throw error
    }
  }

  /**
   * Conditional write under an exclusive lock file
   */
  private async putConditional(
    key: string,
    fullPath: string,
    data: Uint8Array,
    expected: string | null
  ): Promise<WriteResult> {
    // Deterministic lock path so all concurrent writers compete for the same lock
    const lockPath = `${fullPath}${LOCK_SUFFIX}`
    await fs.mkdir(resolve(fullPath, '..'), { recursive: true })

    const lockHandle = await this.acquireLock(key, lockPath, expected)
    try {
      let currentEtag: string | null = null
      try {
        currentEtag = this.generateEtag(new Uint8Array(await fs.readFile(fullPath)))
      } catch (error: unknown) {
        if (!hasErrorCode(error, 'ENOENT')) {
          throw error
        }
      }

      if (currentEtag !== expected) {
        throw new ETagMismatchError(key, expected, currentEtag)
      }

      await writeFileAtomic(fullPath, data)
      return { etag: this.generateEtag(data), size: data.length }
    } finally {
      await lockHandle.close()
      try {
        await fs.unlink(lockPath)
      } catch (lockCleanupError) {
        logger.debug(`Failed to clean up lock file ${lockPath}`, lockCleanupError)
      }
    }
  }

  /**
   * Acquire `lockPath` with O_CREAT|O_EXCL, retrying with exponential backoff
   * and breaking locks older than STALE_LOCK_AGE_MS
   */
  private async acquireLock(key: string, lockPath: string, expected: string | null): Promise<FileHandle> {
    for (let attempt = 0; attempt < LOCK_MAX_RETRIES; attempt++) {
      try {
        return await fs.open(lockPath, 'wx')
      } catch (error: unknown) {
        if (!hasErrorCode(error, 'EEXIST')) {
          throw error
        }
      }

      try {
        const lockStat = await fs.stat(lockPath)
        if (Date.now() - lockStat.mtimeMs > STALE_LOCK_AGE_MS) {
          await fs.unlink(lockPath)
          continue
        }
      } catch (statError) {
        // Lock was released between open and stat; retry immediately
        logger.debug(`Lock file ${lockPath} changed while waiting`, statError)
        continue
      }

      const delay = LOCK_BASE_DELAY_MS * Math.pow(2, attempt) + Math.random() * LOCK_BASE_DELAY_MS
      await new Promise(resolveDelay => setTimeout(resolveDelay, delay))
    }
    throw new ETagMismatchError(key, expected, 'concurrent-write')
  }
}
