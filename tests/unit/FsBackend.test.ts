/**
 * FsBackend Tests
 *
 * Filesystem object store against real temporary directories.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile, mkdir, readFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { FsBackend } from '../../src/storage/FsBackend'
import { ETagMismatchError, ObjectNotFoundError, PathTraversalError } from '../../src/storage/errors'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

describe('FsBackend', () => {
  let tempDir: string
  let backend: FsBackend

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'catalog-sync-fs-'))
    backend = new FsBackend(tempDir)
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('should store the root path and have type "fs"', () => {
    expect(backend.rootPath).toBe(tempDir)
    expect(backend.type).toBe('fs')
  })

  // ===========================================================================
  // Read / Write
  // ===========================================================================

  describe('put and get', () => {
    it('should create parent directories and round-trip bytes', async () => {
      await backend.put('roads/objects/ab/abcd', encoder.encode('payload'))

      expect(await readFile(join(tempDir, 'roads/objects/ab/abcd'), 'utf-8')).toBe('payload')
      expect(decoder.decode((await backend.get('roads/objects/ab/abcd')).data)).toBe('payload')
    })

    it('should derive the etag from content', async () => {
      const first = await backend.put('k', encoder.encode('same'))
      const second = await backend.put('k', encoder.encode('same'))
      expect(first.etag).toBe(second.etag)
      expect((await backend.get('k')).etag).toBe(first.etag)
    })

    it('should throw ObjectNotFoundError for missing keys and directories', async () => {
      await mkdir(join(tempDir, 'dir'))
      await expect(backend.get('missing')).rejects.toBeInstanceOf(ObjectNotFoundError)
      await expect(backend.get('dir')).rejects.toBeInstanceOf(ObjectNotFoundError)
    })

    it('should reject keys that escape the root', async () => {
      await expect(backend.get('../outside')).rejects.toBeInstanceOf(PathTraversalError)
      await expect(backend.put('a/../../x', encoder.encode('x'))).rejects.toBeInstanceOf(PathTraversalError)
    })
  })

  describe('exists, list and delete', () => {
    it('should only report regular files', async () => {
      await mkdir(join(tempDir, 'roads'))
      await writeFile(join(tempDir, 'roads/versions.json'), '{}')

      expect(await backend.exists('roads/versions.json')).toBe(true)
      expect(await backend.exists('roads')).toBe(false)
      expect(await backend.exists('nothing')).toBe(false)
    })

    it('should list keys under a prefix, skipping lock files', async () => {
      await backend.put('roads/versions.json', encoder.encode('{}'))
      await backend.put('roads/objects/ab/abc', encoder.encode('x'))
      await backend.put('roadside/x', encoder.encode('x'))
      await writeFile(join(tempDir, 'roads/versions.json.lock'), '')

      expect(await backend.list('roads')).toEqual(['roads/objects/ab/abc', 'roads/versions.json'])
    })

    it('should return an empty list when the root does not exist', async () => {
      const missing = new FsBackend(join(tempDir, 'nope'))
      expect(await missing.list('')).toEqual([])
    })

    it('should delete files', async () => {
      await backend.put('k', encoder.encode('v'))
      expect(await backend.delete('k')).toBe(true)
      expect(await backend.delete('k')).toBe(false)
    })
  })

  // ===========================================================================
  // Conditional Writes
  // ===========================================================================

  describe('conditional put', () => {
    it('should create with ifMatch null only when absent', async () => {
      await backend.put('roads/versions.json', encoder.encode('v1'), { ifMatch: null })
      await expect(
        backend.put('roads/versions.json', encoder.encode('v2'), { ifMatch: null })
      ).rejects.toBeInstanceOf(ETagMismatchError)
      expect(await readFile(join(tempDir, 'roads/versions.json'), 'utf-8')).toBe('v1')
    })

    it('should replace when the etag matches and release the lock', async () => {
      const { etag } = await backend.put('k', encoder.encode('v1'))
      await backend.put('k', encoder.encode('v2'), { ifMatch: etag })

      expect(await readFile(join(tempDir, 'k'), 'utf-8')).toBe('v2')
      expect(await backend.list('')).toEqual(['k'])
    })

    it('should refuse a stale etag after another writer changed the object', async () => {
      const { etag } = await backend.put('k', encoder.encode('v1'))
      await writeFile(join(tempDir, 'k'), 'changed elsewhere')

      await expect(backend.put('k', encoder.encode('v2'), { ifMatch: etag })).rejects.toBeInstanceOf(
        ETagMismatchError
      )
      expect(await readFile(join(tempDir, 'k'), 'utf-8')).toBe('changed elsewhere')
    })
  })
})
