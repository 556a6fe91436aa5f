/**
 * Version ledger tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import {
  addVersion,
  computeChanges,
  decodeLedger,
  emptyLedger,
  encodeLedger,
  latestVersion,
  ledgerFromJSON,
  ledgerPath,
  readLedger,
  readLedgerOrEmpty,
  writeLedger,
} from '../../src/versioning/ledger'
import { emptyFingerprint } from '../../src/schema/types'
import { ErrorCode, InvalidVersionError, LedgerFormatError, NotFoundError } from '../../src/errors'
import { assetFor, buildLedger, createTempDir, removeTempDir } from '../helpers/catalog'

const SHA_A = 'a'.repeat(64)

function ledgerJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    spec_version: '1.0.0',
    current_version: '1.0.0',
    versions: [
      {
        version: '1.0.0',
        created: '2024-01-01T00:00:00.000Z',
        breaking: false,
        assets: { 'data.parquet': { sha256: SHA_A, size_bytes: 10, href: 'roads/data.parquet' } },
        changes: ['data.parquet'],
      },
    ],
    ...overrides,
  }
}

describe('ledger codec', () => {
  it('should round-trip through bytes', () => {
    const ledger = buildLedger('roads', [
      { version: '1.0.0', files: { 'data.parquet': 'v1' }, message: 'first' },
      { version: '1.0.1', files: { 'data.parquet': 'v2', 'extra.json': '{}' } },
    ])
    expect(decodeLedger(encodeLedger(ledger))).toEqual(ledger)
  })

  it('should write snake_case keys, indented, with a trailing newline', () => {
    const text = new TextDecoder().decode(encodeLedger(buildLedger('roads', [{ version: '1.0.0', files: { a: 'x' } }])))
    expect(text.endsWith('}\n')).toBe(true)
    expect(text.startsWith('{\n  "spec_version": "1.0.0",\n  "current_version": "1.0.0",')).toBe(true)
    expect(JSON.parse(text).versions[0].assets.a.size_bytes).toBe(1)
  })

  it('should default a missing schema to the empty fingerprint', () => {
    const ledger = ledgerFromJSON(ledgerJson())
    expect(latestVersion(ledger)?.schema).toEqual(emptyFingerprint())
    expect(latestVersion(ledger)?.assets['data.parquet']?.sizeBytes).toBe(10)
  })

  it('should reject current_version that does not name the last entry', () => {
    expect(() => ledgerFromJSON(ledgerJson({ current_version: '1.0.1' }), 'test')).toThrow(
      'Invalid ledger in test: current_version: expected 1.0.0 (the last entry)'
    )
    expect(() => ledgerFromJSON(ledgerJson({ current_version: null, versions: [] }), 'test')).not.toThrow()
  })

  it('should reject a malformed checksum with the issue path', () => {
    const json = ledgerJson()
    const versions = [
      {
        version: '1.0.0',
        created: '2024-01-01T00:00:00.000Z',
        breaking: false,
        assets: { 'data.parquet': { sha256: 'ABC', size_bytes: 10, href: 'roads/data.parquet' } },
        changes: [],
      },
    ]
    expect(() => ledgerFromJSON({ ...json, versions }, 'test')).toThrow(
      'Invalid ledger in test: versions.0.assets.data.parquet.sha256: expected 64 lowercase hex characters'
    )
  })

  it('should reject invalid JSON', () => {
    const error = (() => {
      try {
        decodeLedger('{not json', 'remote')
      } catch (e: unknown) {
        return e
      }
      return undefined
    })()
    expect(error).toBeInstanceOf(LedgerFormatError)
    if (error instanceof LedgerFormatError) {
      expect(error.message).toBe('Invalid ledger in remote: invalid JSON')
      expect(error.code).toBe(ErrorCode.INVALID_FORMAT)
    }
  })
})

describe('addVersion', () => {
  it('should append without touching the original ledger', () => {
    const original = emptyLedger()
    const next = addVersion(original, {
      version: '1.0.0',
      assets: { a: assetFor('roads/a', 'x') },
      breaking: false,
      schema: emptyFingerprint(),
      created: '2024-01-01T00:00:00.000Z',
    })

    expect(original.versions).toEqual([])
    expect(original.currentVersion).toBeNull()
    expect(next.currentVersion).toBe('1.0.0')
    expect(next.versions).toHaveLength(1)
    expect(next.versions[0]?.changes).toEqual(['a'])
    expect(next.versions[0]?.created).toBe('2024-01-01T00:00:00.000Z')
  })

  it('should keep earlier entries byte-identical', () => {
    const one = buildLedger('roads', [{ version: '1.0.0', files: { a: 'x' } }])
    const two = addVersion(one, {
      version: '1.0.1',
      assets: { a: assetFor('roads/a', 'y') },
      breaking: true,
      schema: emptyFingerprint(),
    })
    expect(two.versions[0]).toEqual(one.versions[0])
    expect(two.versions[1]?.breaking).toBe(true)
  })

  it.each(['1.0.0', '0.9.9'])('should refuse %s after 1.0.0', version => {
    const ledger = buildLedger('roads', [{ version: '1.0.0', files: { a: 'x' } }])
    expect(() =>
      addVersion(ledger, { version, assets: {}, breaking: false, schema: emptyFingerprint() })
    ).toThrow(`Invalid version "${version}": must be greater than the current version 1.0.0`)
  })

  it('should refuse malformed versions', () => {
    expect(() =>
      addVersion(emptyLedger(), { version: 'v1', assets: {}, breaking: false, schema: emptyFingerprint() })
    ).toThrow(InvalidVersionError)
  })
})

describe('computeChanges', () => {
  it('should list every asset for a first version', () => {
    expect(computeChanges(null, { a: assetFor('r/a', '1'), b: assetFor('r/b', '2') })).toEqual(['a', 'b'])
  })

  it('should list new and modified assets only', () => {
    const previous = latestVersion(buildLedger('r', [{ version: '1.0.0', files: { a: '1', b: '2' } }]))
    expect(
      computeChanges(previous, { a: assetFor('r/a', '1'), b: assetFor('r/b', 'changed'), c: assetFor('r/c', '3') })
    ).toEqual(['b', 'c'])
  })
})

describe('ledger files', () => {
  let root: string

  beforeEach(async () => {
    root = await createTempDir()
  })

  afterEach(async () => {
    await removeTempDir(root)
  })

  it('should place the ledger in the collection directory', () => {
    expect(ledgerPath(root, 'roads')).toBe(join(root, 'roads', 'versions.json'))
  })

  it('should write atomically and read back', async () => {
    const ledger = buildLedger('roads', [{ version: '1.0.0', files: { a: 'x' } }])
    const path = ledgerPath(root, 'roads')
    await writeLedger(path, ledger)

    expect(await readdir(join(root, 'roads'))).toEqual(['versions.json'])
    expect(await readLedger(path)).toEqual(ledger)
    expect(JSON.parse(await readFile(path, 'utf-8')).current_version).toBe('1.0.0')
  })

  it('should report a missing ledger as NOT_FOUND', async () => {
    const error = await readLedger(ledgerPath(root, 'roads')).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(NotFoundError)
    if (error instanceof NotFoundError) {
      expect(error.code).toBe(ErrorCode.NOT_FOUND)
    }
    expect(await readLedgerOrEmpty(ledgerPath(root, 'roads'))).toEqual(emptyLedger())
  })
})
