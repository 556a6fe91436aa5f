/**
 * Pull executor tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { readFile, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { pull, mergeLedgers } from '../../src/sync/pull'
import { push } from '../../src/sync/push'
import { planSync } from '../../src/sync/planner'
import { objectKey } from '../../src/sync/layout'
import { MemoryBackend } from '../../src/storage/MemoryBackend'
import { emptyLedger, ledgerPath, readLedger, readLedgerOrEmpty } from '../../src/versioning/ledger'
import { recordVersion } from '../../src/versioning/record'
import type { Ledger } from '../../src/versioning/types'
import {
  PullConflictError,
  RemoteNotFoundError,
  TransferError,
  UncommittedChangesError,
} from '../../src/errors'
import { sha256 } from '../../src/sync/hash'
import { buildLedger, createTempDir, removeTempDir, writeCatalogFile } from '../helpers/catalog'

const COLLECTION = 'roads'

async function record(root: string, files: Record<string, string>): Promise<Ledger> {
  for (const [href, content] of Object.entries(files)) {
    await writeCatalogFile(root, href, content)
  }
  const result = await recordVersion({ catalogRoot: root, collection: COLLECTION, files: Object.keys(files) })
  if (!result.ok) throw result.error
  return readLedger(ledgerPath(root, COLLECTION))
}

async function publish(root: string, store: MemoryBackend): Promise<void> {
  const result = await push({ catalogRoot: root, collection: COLLECTION, store })
  if (!result.ok) throw result.error
}

describe('pull', () => {
  let upstream: string
  let workingCopy: string
  let store: MemoryBackend

  beforeEach(async () => {
    upstream = await createTempDir('catalog-sync-up-')
    workingCopy = await createTempDir('catalog-sync-wc-')
    store = new MemoryBackend()
  })

  afterEach(async () => {
    await removeTempDir(upstream)
    await removeTempDir(workingCopy)
  })

  // ===========================================================================
  // Fast-forward
  // ===========================================================================

  it('should download assets and write the ledger into an empty working copy', async () => {
    const remoteLedger = await record(upstream, { 'roads/a.parquet': 'a1', 'roads/nested/b.parquet': 'b1' })
    await publish(upstream, store)

    const result = await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.filesDownloaded).toBe(2)
    expect(result.value.versionsPulled).toEqual(['1.0.0'])
    expect(result.value.localVersionBefore).toBeNull()
    expect(result.value.localVersionAfter).toBe('1.0.0')

    expect(await readFile(join(workingCopy, 'roads/a.parquet'), 'utf-8')).toBe('a1')
    expect(await readFile(join(workingCopy, 'roads/nested/b.parquet'), 'utf-8')).toBe('b1')
    expect(await readLedger(ledgerPath(workingCopy, COLLECTION))).toEqual(remoteLedger)
  })

  it('should restore recorded modification times', async () => {
    const remoteLedger = await record(upstream, { 'roads/a.parquet': 'a1' })
    await publish(upstream, store)
    await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })

    const recorded = remoteLedger.versions[0]?.assets['a.parquet']?.mtime ?? 0
    const { mtimeMs } = await stat(join(workingCopy, 'roads/a.parquet'))
    expect(Math.abs(mtimeMs / 1000 - recorded)).toBeLessThan(0.001)
  })

  it('should fetch only changed assets when the remote moves ahead', async () => {
    await record(upstream, { 'roads/a.parquet': 'a1', 'roads/b.parquet': 'b1' })
    await publish(upstream, store)
    await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })

    await record(upstream, { 'roads/b.parquet': 'b2' })
    await publish(upstream, store)

    const result = await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })
    expect(result.ok && result.value.assets.map(a => a.name)).toEqual(['b.parquet'])
    expect(result.ok && result.value.localVersionAfter).toBe('1.0.1')
    expect(await readFile(join(workingCopy, 'roads/b.parquet'), 'utf-8')).toBe('b2')
    expect((await readLedger(ledgerPath(workingCopy, COLLECTION))).versions.map(v => v.version)).toEqual([
      '1.0.0',
      '1.0.1',
    ])
  })

  it('should skip files that already hold the remote content', async () => {
    await record(upstream, { 'roads/a.parquet': 'a1' })
    await publish(upstream, store)
    await writeCatalogFile(workingCopy, 'roads/a.parquet', 'a1')

    const result = await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })
    expect(result.ok && result.value.filesSkipped).toBe(1)
    expect(result.ok && result.value.filesDownloaded).toBe(0)
  })

  // ===========================================================================
  // No-ops
  // ===========================================================================

  it('should report a missing remote ledger', async () => {
    const result = await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })
    expect(!result.ok && result.error).toBeInstanceOf(RemoteNotFoundError)
    expect(!result.ok && result.error.message).toBe('No remote ledger found at roads/versions.json')
  })

  it('should report up to date', async () => {
    await record(upstream, { 'roads/a.parquet': 'a1' })
    await publish(upstream, store)

    const result = await pull({ catalogRoot: upstream, collection: COLLECTION, store })
    expect(result.ok && result.value.upToDate).toBe(true)
    expect(result.ok && result.value.versionsPulled).toEqual([])
  })

  it('should leave a working copy that is ahead untouched', async () => {
    await record(upstream, { 'roads/a.parquet': 'a1' })
    await publish(upstream, store)
    const local = await record(upstream, { 'roads/a.parquet': 'a2' })

    const result = await pull({ catalogRoot: upstream, collection: COLLECTION, store })
    expect(result.ok && result.value.localAhead).toBe(true)
    expect(await readLedger(ledgerPath(upstream, COLLECTION))).toEqual(local)
  })

  it('should change nothing on a dry run', async () => {
    await record(upstream, { 'roads/a.parquet': 'a1' })
    await publish(upstream, store)

    const result = await pull({ catalogRoot: workingCopy, collection: COLLECTION, store, dryRun: true })
    expect(result.ok && result.value.assets.map(a => a.name)).toEqual(['a.parquet'])
    expect(result.ok && result.value.localVersionAfter).toBeNull()
    expect(await readLedgerOrEmpty(ledgerPath(workingCopy, COLLECTION))).toEqual(emptyLedger())
    await expect(stat(join(workingCopy, 'roads/a.parquet'))).rejects.toThrow()
  })

  // ===========================================================================
  // Guards
  // ===========================================================================

  describe('uncommitted changes', () => {
    it('should refuse and leave the edited file byte-identical', async () => {
      await record(upstream, { 'roads/a.parquet': 'a1' })
      await publish(upstream, store)
      await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })
      await writeCatalogFile(workingCopy, 'roads/a.parquet', 'local edit')
      await record(upstream, { 'roads/a.parquet': 'a2' })
      await publish(upstream, store)
      const ledgerBefore = await readFile(ledgerPath(workingCopy, COLLECTION), 'utf-8')

      const result = await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(UncommittedChangesError)
        expect(result.error instanceof UncommittedChangesError && result.error.files).toEqual(['a.parquet'])
      }
      expect(await readFile(join(workingCopy, 'roads/a.parquet'), 'utf-8')).toBe('local edit')
      expect(await readFile(ledgerPath(workingCopy, COLLECTION), 'utf-8')).toBe(ledgerBefore)
    })

    it('should overwrite local edits with --force', async () => {
      await record(upstream, { 'roads/a.parquet': 'a1' })
      await publish(upstream, store)
      await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })
      await writeCatalogFile(workingCopy, 'roads/a.parquet', 'local edit')
      await record(upstream, { 'roads/a.parquet': 'a2' })
      await publish(upstream, store)

      const result = await pull({ catalogRoot: workingCopy, collection: COLLECTION, store, force: true })
      expect(result.ok).toBe(true)
      expect(await readFile(join(workingCopy, 'roads/a.parquet'), 'utf-8')).toBe('a2')
    })
  })

  describe('divergence', () => {
    async function diverge(): Promise<void> {
      await record(upstream, { 'roads/a.parquet': 'a1' })
      await publish(upstream, store)
      await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })
      await record(upstream, { 'roads/a.parquet': 'upstream' })
      await publish(upstream, store)
      await record(workingCopy, { 'roads/a.parquet': 'local' })
    }

    it('should refuse a diverged remote', async () => {
      await diverge()
      const result = await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })

      expect(!result.ok && result.error).toBeInstanceOf(PullConflictError)
      expect(!result.ok && result.error.message).toBe(
        'Local and remote diverged after 1.0.0 (local: 1.0.1; remote: 1.0.1): use --force to take the remote history'
      )
      expect(await readFile(join(workingCopy, 'roads/a.parquet'), 'utf-8')).toBe('local')
    })

    it('should take the remote history with --force and report what it discarded', async () => {
      await diverge()
      const upstreamLedger = await readLedger(ledgerPath(upstream, COLLECTION))

      const result = await pull({ catalogRoot: workingCopy, collection: COLLECTION, store, force: true })

      expect(result.ok && result.value.discardedVersions).toEqual(['1.0.1'])
      expect(await readFile(join(workingCopy, 'roads/a.parquet'), 'utf-8')).toBe('upstream')
      expect(await readLedger(ledgerPath(workingCopy, COLLECTION))).toEqual(upstreamLedger)
    })
  })

  it('should fail without touching the ledger when a remote object is missing', async () => {
    await record(upstream, { 'roads/a.parquet': 'a1' })
    await publish(upstream, store)
    const key = objectKey(COLLECTION, sha256('a1'))
    await store.delete(key)

    const result = await pull({ catalogRoot: workingCopy, collection: COLLECTION, store })

    expect(!result.ok && result.error).toBeInstanceOf(TransferError)
    expect(!result.ok && result.error.message).toBe(`Remote object for a.parquet is missing: ${key}`)
    expect(await readLedgerOrEmpty(ledgerPath(workingCopy, COLLECTION))).toEqual(emptyLedger())
  })
})

describe('mergeLedgers', () => {
  it('should keep the shared prefix and append remote entries', () => {
    const local = buildLedger('roads', [{ version: '1.0.0', files: { a: '1' } }])
    const remote = buildLedger('roads', [
      { version: '1.0.0', files: { a: '1' } },
      { version: '1.0.1', files: { a: '2' } },
    ])
    const merged = mergeLedgers(local, remote, planSync(local, { ledger: remote, etag: '"e"', exists: true }))
    expect(merged).toEqual(remote)
  })
})
