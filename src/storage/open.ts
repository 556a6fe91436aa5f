/**
 * Remote URL -> ObjectStore
 *
 * Supported:
 *   file:///abs/path, /abs/path, ./rel/path  -> FsBackend
 *   memory://name                            -> process-local MemoryBackend
 *
 * Cloud schemes (s3://, gs://, az://, ...) need authenticated transport and
 * are rejected.
 */

import { isAbsolute, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { ObjectStore } from '../types/storage'
import { FsBackend } from './FsBackend'
import { getNamedMemoryBackend } from './MemoryBackend'
import { ConfigurationError } from '../errors'

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i

export interface OpenStoreOptions {
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string | undefined
}

/**
 * Open the object store a remote URL points at
 *
 * @throws ConfigurationError for an empty URL or an unsupported scheme
 *
 * @example
 * ```typescript
 * const store = openStore('file:///mnt/shared/catalog')
 * ```
 */
export function openStore(url: string, options: OpenStoreOptions = {}): ObjectStore {
  const trimmed = url.trim()
  if (trimmed.length === 0) {
    throw new ConfigurationError('Remote URL is empty')
  }

  const match = SCHEME_PATTERN.exec(trimmed)
  if (!match) {
    const cwd = options.cwd ?? process.cwd()
    return new FsBackend(isAbsolute(trimmed) ? trimmed : resolve(cwd, trimmed))
  }

  const scheme = (match[1] ?? '').toLowerCase()
  switch (scheme) {
    case 'file':
      return new FsBackend(fileURLToPath(trimmed))
    case 'memory': {
      const name = trimmed.slice(match[0].length)
      return getNamedMemoryBackend(name.length > 0 ? name : 'default')
    }
    default:
      throw new ConfigurationError(
        `Unsupported remote scheme "${scheme}://": only file:// and memory:// remotes are available`,
        { url: trimmed, scheme }
      )
  }
}
