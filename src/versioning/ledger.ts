/**
 * Version Ledger
 *
 * Reads, validates, writes and extends versions.json. The ledger is handled
 * as an immutable value: addVersion returns a new ledger, and the only side
 * effect anywhere in this module is the atomic file write in writeLedger.
 *
 * @module versioning/ledger
 */

import { promises as fs } from 'node:fs'
import { join } from 'node:path'
import { z } from 'zod'
import type { Asset, Ledger, NewVersion, Version } from './types'
import { SchemaFingerprintJsonSchema, emptyFingerprint, fingerprintFromJSON, fingerprintToJSON } from '../schema/types'
import { compareVersions, isValidVersion, parseVersion } from './semver'
import { InvalidVersionError, LedgerFormatError, NotFoundError, ErrorCode, hasErrorCode } from '../errors'
import { writeFileAtomic } from '../utils/atomic-write'
import { LEDGER_FILENAME, LEDGER_SPEC_VERSION } from '../constants'

// =============================================================================
// On-disk schema
// =============================================================================

const VersionStringSchema = z.string().refine(isValidVersion, {
  message: 'expected MAJOR.MINOR.PATCH',
})

const AssetJsonSchema = z.object({
  sha256: z.string().regex(/^[0-9a-f]{64}$/, 'expected 64 lowercase hex characters'),
  size_bytes: z.number().int().nonnegative(),
  href: z.string().min(1),
  source_path: z.string().optional(),
  source_mtime: z.number().optional(),
  mtime: z.number().optional(),
})

const VersionJsonSchema = z.object({
  version: VersionStringSchema,
  created: z.string(),
  breaking: z.boolean(),
  schema: SchemaFingerprintJsonSchema.optional(),
  assets: z.record(AssetJsonSchema),
  changes: z.array(z.string()),
  message: z.string().optional(),
})

const LedgerJsonSchema = z
  .object({
    spec_version: z.string(),
    current_version: VersionStringSchema.nullable(),
    versions: z.array(VersionJsonSchema),
  })
  .superRefine((ledger, ctx) => {
    const last = ledger.versions[ledger.versions.length - 1]
    const expected = last ? last.version : null
    if (ledger.current_version !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['current_version'],
        message: `expected ${expected ?? 'null'} (the last entry)`,
      })
    }
  })

export type AssetJson = z.infer<typeof AssetJsonSchema>
export type VersionJson = z.infer<typeof VersionJsonSchema>
export type LedgerJson = z.infer<typeof LedgerJsonSchema>

// =============================================================================
// Codec
// =============================================================================

function assetToJSON(asset: Asset): AssetJson {
  return {
    sha256: asset.sha256,
    size_bytes: asset.sizeBytes,
    href: asset.href,
    source_path: asset.sourcePath,
    source_mtime: asset.sourceMtime,
    mtime: asset.mtime,
  }
}

function assetFromJSON(json: AssetJson): Asset {
  return {
    sha256: json.sha256,
    sizeBytes: json.size_bytes,
    href: json.href,
    sourcePath: json.source_path,
    sourceMtime: json.source_mtime,
    mtime: json.mtime,
  }
}

function mapRecord<A, B>(record: Record<string, A>, fn: (value: A) => B): Record<string, B> {
  const result: Record<string, B> = {}
  for (const [key, value] of Object.entries(record)) {
    result[key] = fn(value)
  }
  return result
}

/**
 * Convert a version entry to its on-disk form
 */
export function versionToJSON(version: Version): VersionJson {
  return {
    version: version.version,
    created: version.created,
    breaking: version.breaking,
    schema: fingerprintToJSON(version.schema),
    assets: mapRecord(version.assets, assetToJSON),
    changes: [...version.changes],
    message: version.message,
  }
}

function versionFromJSON(json: VersionJson): Version {
  return {
    version: json.version,
    created: json.created,
    breaking: json.breaking,
    schema: json.schema ? fingerprintFromJSON(json.schema) : emptyFingerprint(),
    assets: mapRecord(json.assets, assetFromJSON),
    changes: [...json.changes],
    message: json.message,
  }
}

/**
 * Convert a ledger to its on-disk (snake_case) form
 */
export function ledgerToJSON(ledger: Ledger): LedgerJson {
  return {
    spec_version: ledger.specVersion,
    current_version: ledger.currentVersion,
    versions: ledger.versions.map(versionToJSON),
  }
}

/**
 * Validate an arbitrary parsed JSON value and convert it to a ledger
 *
 * @throws LedgerFormatError when the value is not a valid ledger
 */
export function ledgerFromJSON(value: unknown, source = 'versions.json'): Ledger {
  const parsed = LedgerJsonSchema.safeParse(value)
  if (!parsed.success) {
    throw new LedgerFormatError(source, formatIssues(parsed.error))
  }
  return {
    specVersion: parsed.data.spec_version,
    currentVersion: parsed.data.current_version,
    versions: parsed.data.versions.map(versionFromJSON),
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Serialize a ledger to bytes (indented JSON with a trailing newline)
 */
export function encodeLedger(ledger: Ledger): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(ledgerToJSON(ledger), null, 2) + '\n')
}

/**
 * Parse ledger bytes
 *
 * @throws LedgerFormatError for invalid JSON or an invalid ledger
 */
export function decodeLedger(data: Uint8Array | string, source = 'versions.json'): Ledger {
  const text = typeof data === 'string' ? data : new TextDecoder().decode(data)
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (error: unknown) {
    throw new LedgerFormatError(
      source,
      'invalid JSON',
      error instanceof Error ? error : undefined
    )
  }
  return ledgerFromJSON(value, source)
}

// =============================================================================
// Filesystem
// =============================================================================

/**
 * Location of a collection's ledger
 */
export function ledgerPath(catalogRoot: string, collection: string): string {
  return join(catalogRoot, collection, LEDGER_FILENAME)
}

/**
 * Read and validate a ledger file
 *
 * @throws NotFoundError if the file does not exist
 * @throws LedgerFormatError if it is not a valid ledger
 */
export async function readLedger(path: string): Promise<Ledger> {
  let data: Buffer
  try {
    data = await fs.readFile(path)
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new NotFoundError(path, `Ledger not found: ${path}`, ErrorCode.NOT_FOUND)
    }
    throw error
  }
  return decodeLedger(new Uint8Array(data), path)
}

/**
 * Read a ledger, treating an absent file as an empty ledger
 */
export async function readLedgerOrEmpty(path: string): Promise<Ledger> {
  try {
    return await readLedger(path)
  } catch (error: unknown) {
    if (error instanceof NotFoundError) {
      return emptyLedger()
    }
    throw error
  }
}

/**
 * Atomically replace the ledger file
 */
export async function writeLedger(path: string, ledger: Ledger): Promise<void> {
  await writeFileAtomic(path, encodeLedger(ledger))
}

// =============================================================================
// Pure operations
// =============================================================================

/**
 * The ledger a new collection starts with
 */
export function emptyLedger(): Ledger {
  return { specVersion: LEDGER_SPEC_VERSION, currentVersion: null, versions: [] }
}

/**
 * The most recent entry, or null for an empty ledger
 */
export function latestVersion(ledger: Ledger): Version | null {
  return ledger.versions[ledger.versions.length - 1] ?? null
}

/**
 * Append a version, returning a new ledger
 *
 * @throws InvalidVersionError when the version is malformed or does not
 * advance past the current version
 *
 * @example
 * ```typescript
 * const next = addVersion(ledger, {
 *   version: nextVersion(ledger.currentVersion),
 *   assets,
 *   breaking: false,
 *   schema,
 * })
 * await writeLedger(ledgerPath(root, 'roads'), next)
 * ```
 */
export function addVersion(ledger: Ledger, input: NewVersion): Ledger {
  parseVersion(input.version)
  if (ledger.currentVersion !== null && compareVersions(input.version, ledger.currentVersion) <= 0) {
    throw new InvalidVersionError(
      input.version,
      `must be greater than the current version ${ledger.currentVersion}`
    )
  }

  const previous = latestVersion(ledger)
  const entry: Version = {
    version: input.version,
    created: input.created ?? new Date().toISOString(),
    breaking: input.breaking,
    schema: input.schema,
    assets: { ...input.assets },
    changes: computeChanges(previous, input.assets),
    message: input.message,
  }

  return {
    specVersion: ledger.specVersion,
    currentVersion: entry.version,
    versions: [...ledger.versions, entry],
  }
}

/**
 * Names of assets that are new or whose checksum differs from `previous`
 */
export function computeChanges(previous: Version | null, assets: Record<string, Asset>): string[] {
  if (!previous) {
    return Object.keys(assets)
  }
  return Object.entries(assets)
    .filter(([name, asset]) => previous.assets[name]?.sha256 !== asset.sha256)
    .map(([name]) => name)
}
