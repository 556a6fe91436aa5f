/**
 * Remote URL resolution tests
 */

import { describe, it, expect, afterEach } from 'vitest'
import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import { openStore } from '../../src/storage/open'
import { FsBackend } from '../../src/storage/FsBackend'
import { MemoryBackend, clearNamedMemoryBackends, getNamedMemoryBackend } from '../../src/storage/MemoryBackend'
import { ConfigurationError } from '../../src/errors'

describe('openStore', () => {
  afterEach(() => {
    clearNamedMemoryBackends()
  })

  it('should open file:// URLs on the filesystem', () => {
    const path = join('/tmp', 'catalog-remote')
    const store = openStore(pathToFileURL(path).href)
    expect(store).toBeInstanceOf(FsBackend)
    expect(store.type).toBe('fs')
  })

  it('should treat scheme-less values as paths relative to cwd', () => {
    const store = openStore('remote/catalog', { cwd: '/srv' })
    expect(store).toBeInstanceOf(FsBackend)
    if (store instanceof FsBackend) {
      expect(store.rootPath).toBe(join('/srv', 'remote/catalog'))
    }
  })

  it('should share memory:// stores by name', () => {
    const first = openStore('memory://shared')
    expect(first).toBeInstanceOf(MemoryBackend)
    expect(openStore('memory://shared')).toBe(first)
    expect(openStore('memory://other')).not.toBe(first)
    expect(openStore('memory://')).toBe(getNamedMemoryBackend('default'))
  })

  it('should reject empty URLs', () => {
    expect(() => openStore('   ')).toThrow(new ConfigurationError('Remote URL is empty'))
  })

  it('should reject cloud schemes', () => {
    expect(() => openStore('s3://bucket/catalog')).toThrow(
      'Unsupported remote scheme "s3://": only file:// and memory:// remotes are available'
    )
  })
})
