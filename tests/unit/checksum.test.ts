/**
 * Checksum engine tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, symlink, utimes, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import {
  checksum,
  describeFile,
  findUncommittedChanges,
  isCurrent,
  isStale,
  isTracked,
  mtimeMatches,
  type FileState,
  type StalenessReason,
} from '../../src/versioning/checksum'
import { addVersion, emptyLedger } from '../../src/versioning/ledger'
import { emptyFingerprint } from '../../src/schema/types'
import type { VectorFingerprint } from '../../src/schema/types'
import { NotFoundError, NotRegularFileError } from '../../src/errors'
import { sha256 } from '../../src/sync/hash'
import { buildLedger, createTempDir, removeTempDir, writeCatalogFile } from '../helpers/catalog'

describe('checksum engine', () => {
  let root: string

  beforeEach(async () => {
    root = await createTempDir()
  })

  afterEach(async () => {
    await removeTempDir(root)
  })

  // ===========================================================================
  // checksum
  // ===========================================================================

  describe('checksum', () => {
    it('should hash file contents', async () => {
      const path = await writeCatalogFile(root, 'a.txt', 'abc')
      expect(await checksum(path)).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad')
    })

    it('should be idempotent and match across chunk boundaries', async () => {
      const content = 'x'.repeat(8192 * 2 + 17)
      const path = await writeCatalogFile(root, 'big.bin', content)
      const first = await checksum(path)
      expect(await checksum(path)).toBe(first)
      expect(first).toBe(sha256(content))
    })

    it('should follow symbolic links to files', async () => {
      const target = await writeCatalogFile(root, 'target.txt', 'linked')
      const link = join(root, 'link.txt')
      await symlink(target, link)
      expect(await checksum(link)).toBe(sha256('linked'))
    })

    it('should reject a symbolic link to a directory', async () => {
      await mkdir(join(root, 'dir'))
      const link = join(root, 'dir-link')
      await symlink(join(root, 'dir'), link)
      await expect(checksum(link)).rejects.toBeInstanceOf(NotRegularFileError)
    })

    it('should report a missing file as NotFoundError', async () => {
      await expect(checksum(join(root, 'missing'))).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  // ===========================================================================
  // isCurrent
  // ===========================================================================

  describe('isCurrent', () => {
    it('should trust matching mtime and size unless verify is set', async () => {
      await writeCatalogFile(root, 'roads/data.bin', 'AAAA')
      const asset = await describeFile(root, 'roads/data.bin')
      const path = join(root, 'roads/data.bin')

      // Same size, different bytes, mtime restored
      await writeFile(path, 'BBBB')
      const mtime = asset.mtime ?? 0
      await utimes(path, mtime, mtime)

      expect(await isCurrent(path, asset)).toBe(true)
      expect(await isCurrent(path, asset, { verify: true })).toBe(false)
    })

    it('should fall back to the checksum when mtime differs', async () => {
      await writeCatalogFile(root, 'roads/data.bin', 'AAAA')
      const asset = await describeFile(root, 'roads/data.bin')
      const path = join(root, 'roads/data.bin')
      const later = (asset.mtime ?? 0) + 100
      await utimes(path, later, later)

      expect(await isCurrent(path, asset)).toBe(true)
      await writeFile(path, 'BBBB')
      expect(await isCurrent(path, asset)).toBe(false)
    })

    it('should treat a missing file as not current', async () => {
      const asset = { sha256: sha256('x'), sizeBytes: 1, href: 'gone' }
      expect(await isCurrent(join(root, 'gone'), asset)).toBe(false)
    })
  })

  // ===========================================================================
  // Tracking
  // ===========================================================================

  describe('describeFile', () => {
    it('should record a POSIX href relative to the root', async () => {
      await writeCatalogFile(root, 'roads/2024/data.parquet', 'hello')
      const asset = await describeFile(root, 'roads/2024/data.parquet')
      expect(asset.href).toBe('roads/2024/data.parquet')
      expect(asset.sha256).toBe(sha256('hello'))
      expect(asset.sizeBytes).toBe(5)
      expect(typeof asset.mtime).toBe('number')
    })
  })

  describe('isTracked and findUncommittedChanges', () => {
    it('should report nothing for a clean working copy', async () => {
      await writeCatalogFile(root, 'roads/a.parquet', 'a1')
      await writeCatalogFile(root, 'roads/b.parquet', 'b1')
      const ledger = buildLedger('roads', [{ version: '1.0.0', files: { 'a.parquet': 'a1', 'b.parquet': 'b1' } }])

      expect(await findUncommittedChanges(root, ledger)).toEqual([])
      expect(await isTracked(root, 'roads/a.parquet', ledger)).toBe(true)
      expect(await isTracked(root, 'roads/other.parquet', ledger)).toBe(false)
    })

    it('should list modified, missing and non-regular assets, sorted', async () => {
      await writeCatalogFile(root, 'roads/a.parquet', 'a1')
      await writeCatalogFile(root, 'roads/c.parquet', 'changed')
      await mkdir(join(root, 'roads/d.parquet'))
      const ledger = buildLedger('roads', [
        { version: '1.0.0', files: { 'd.parquet': 'd1', 'c.parquet': 'c1', 'b.parquet': 'b1', 'a.parquet': 'a1' } },
      ])

      expect(await findUncommittedChanges(root, ledger)).toEqual(['b.parquet', 'c.parquet', 'd.parquet'])
    })

    it('should report nothing for an empty ledger', async () => {
      expect(await findUncommittedChanges(root, emptyLedger())).toEqual([])
      expect(await isTracked(root, 'roads/a.parquet', emptyLedger())).toBe(false)
    })

    it('should only consider the latest version', async () => {
      await writeCatalogFile(root, 'roads/new.parquet', 'n')
      const first = buildLedger('roads', [{ version: '1.0.0', files: { 'old.parquet': 'gone' } }])
      const ledger = addVersion(first, {
        version: '1.0.1',
        assets: { 'new.parquet': { sha256: sha256('n'), sizeBytes: 1, href: 'roads/new.parquet' } },
        breaking: false,
        schema: emptyFingerprint(),
      })
      expect(await findUncommittedChanges(root, ledger)).toEqual([])
    })
  })
})

// =============================================================================
// isStale
// =============================================================================

describe('isStale', () => {
  const schemaA: VectorFingerprint = {
    kind: 'vector',
    fingerprint: { crs: null, columns: [{ name: 'id', type: 'int64', nullable: false }] },
  }
  const schemaB: VectorFingerprint = {
    kind: 'vector',
    fingerprint: { crs: null, columns: [{ name: 'id', type: 'string', nullable: false }] },
  }

  it.each<[string, FileState, boolean, StalenessReason]>([
    ['never recorded', { storedMtime: null, currentMtime: 5 }, true, 'new_file'],
    ['same mtime', { storedMtime: 5, currentMtime: 5.0005 }, false, 'mtime_unchanged'],
    [
      'schema changed',
      { storedMtime: 5, currentMtime: 6, storedSchema: schemaA, currentSchema: schemaB },
      true,
      'schema_changed',
    ],
    [
      'content changed',
      { storedMtime: 5, currentMtime: 6, storedSha256: sha256('a'), currentSha256: sha256('b') },
      true,
      'content_changed',
    ],
    [
      'touched only',
      { storedMtime: 5, currentMtime: 6, storedSha256: sha256('a'), currentSha256: sha256('a') },
      false,
      'touched_unchanged',
    ],
  ])('%s', (_label, state, stale, reason) => {
    expect(isStale(state)).toEqual({ stale, reason })
  })

  it('should compare mtimes within a millisecond', () => {
    expect(mtimeMatches(10, 10.001)).toBe(true)
    expect(mtimeMatches(10, 10.01)).toBe(false)
  })
})
