/**
 * Breaking Change Detection
 *
 * Compares two schema fingerprints and lists the structural differences that
 * could invalidate a consumer built against the older one. Additive changes
 * (new columns or bands, widened nullability) and free-text metadata
 * (description, unit, semantic type) are never reported.
 *
 * @module schema/breaking
 */

import type { BandSchema, ColumnSchema, SchemaFingerprint } from './types'
import { fingerprintToJSON } from './types'
import { canonicalJson } from '../sync/hash'

// =============================================================================
// Types
// =============================================================================

/**
 * Kinds of breaking change
 */
export type BreakingChangeType =
  | 'format_changed'
  | 'crs_changed'
  | 'column_removed'
  | 'band_removed'
  | 'type_changed'
  | 'data_type_changed'
  | 'geometry_type_changed'
  | 'column_crs_changed'
  | 'nullability_narrowed'
  | 'nodata_changed'

/**
 * One structural difference between two fingerprints
 */
export interface BreakingChange {
  changeType: BreakingChangeType
  /** Column or band name, or 'schema' / 'format' for whole-schema changes */
  element: string
  oldValue?: string | null | undefined
  newValue?: string | null | undefined
}

// =============================================================================
// Detection
// =============================================================================

/**
 * Detect breaking changes between two schema fingerprints
 *
 * A kind (format) mismatch is reported alone: nothing else is comparable.
 *
 * @example
 * ```typescript
 * const changes = detectBreakingChanges(previous.schema, next.schema)
 * if (changes.length > 0) {
 *   console.log(changes.map(describeChange).join('\n'))
 * }
 * ```
 */
export function detectBreakingChanges(
  oldSchema: SchemaFingerprint,
  newSchema: SchemaFingerprint
): BreakingChange[] {
  if (oldSchema.kind !== newSchema.kind) {
    return [{
      changeType: 'format_changed',
      element: 'format',
      oldValue: oldSchema.kind,
      newValue: newSchema.kind,
    }]
  }

  const changes: BreakingChange[] = []

  if (oldSchema.fingerprint.crs !== newSchema.fingerprint.crs) {
    changes.push({
      changeType: 'crs_changed',
      element: 'schema',
      oldValue: oldSchema.fingerprint.crs,
      newValue: newSchema.fingerprint.crs,
    })
  }

  if (oldSchema.kind === 'vector' && newSchema.kind === 'vector') {
    changes.push(...detectColumnChanges(oldSchema.fingerprint.columns, newSchema.fingerprint.columns))
  } else if (oldSchema.kind === 'raster' && newSchema.kind === 'raster') {
    changes.push(...detectBandChanges(oldSchema.fingerprint.bands, newSchema.fingerprint.bands))
  }

  return changes
}

/**
 * True when at least one breaking change separates the two fingerprints
 */
export function isBreaking(oldSchema: SchemaFingerprint, newSchema: SchemaFingerprint): boolean {
  return detectBreakingChanges(oldSchema, newSchema).length > 0
}

/**
 * Structural equality of two fingerprints, metadata fields included
 */
export function fingerprintsEqual(a: SchemaFingerprint, b: SchemaFingerprint): boolean {
  return canonicalJson(fingerprintToJSON(a)) === canonicalJson(fingerprintToJSON(b))
}

function detectColumnChanges(oldColumns: ColumnSchema[], newColumns: ColumnSchema[]): BreakingChange[] {
  const changes: BreakingChange[] = []
  const byName = new Map(newColumns.map(c => [c.name, c]))

  for (const oldCol of oldColumns) {
    const newCol = byName.get(oldCol.name)
    if (!newCol) {
      changes.push({ changeType: 'column_removed', element: oldCol.name })
      continue
    }

    if (oldCol.type !== newCol.type) {
      changes.push({
        changeType: 'type_changed',
        element: oldCol.name,
        oldValue: oldCol.type,
        newValue: newCol.type,
      })
    }

    const oldGeom = oldCol.geometryType ?? null
    const newGeom = newCol.geometryType ?? null
    if (oldGeom !== null && oldGeom !== newGeom) {
      changes.push({
        changeType: 'geometry_type_changed',
        element: oldCol.name,
        oldValue: oldGeom,
        newValue: newGeom,
      })
    }

    const oldCrs = oldCol.crs ?? null
    const newCrs = newCol.crs ?? null
    if (oldCrs !== null && oldCrs !== newCrs) {
      changes.push({
        changeType: 'column_crs_changed',
        element: oldCol.name,
        oldValue: oldCrs,
        newValue: newCrs,
      })
    }

    if (oldCol.nullable && !newCol.nullable) {
      changes.push({
        changeType: 'nullability_narrowed',
        element: oldCol.name,
        oldValue: 'nullable',
        newValue: 'not null',
      })
    }
  }

  return changes
}

function detectBandChanges(oldBands: BandSchema[], newBands: BandSchema[]): BreakingChange[] {
  const changes: BreakingChange[] = []
  const byName = new Map(newBands.map(b => [b.name, b]))

  for (const oldBand of oldBands) {
    const newBand = byName.get(oldBand.name)
    if (!newBand) {
      changes.push({ changeType: 'band_removed', element: oldBand.name })
      continue
    }

    if (oldBand.dataType !== newBand.dataType) {
      changes.push({
        changeType: 'data_type_changed',
        element: oldBand.name,
        oldValue: oldBand.dataType,
        newValue: newBand.dataType,
      })
    }

    if (!nodataEqual(oldBand.nodata, newBand.nodata)) {
      changes.push({
        changeType: 'nodata_changed',
        element: oldBand.name,
        oldValue: formatNodata(oldBand.nodata),
        newValue: formatNodata(newBand.nodata),
      })
    }
  }

  return changes
}

/**
 * Nodata equality where NaN equals NaN and an absent value equals null
 */
export function nodataEqual(a: number | null | undefined, b: number | null | undefined): boolean {
  const left = a ?? null
  const right = b ?? null
  if (left === null || right === null) {
    return left === right
  }
  if (Number.isNaN(left) && Number.isNaN(right)) {
    return true
  }
  return left === right
}

function formatNodata(value: number | null | undefined): string | null {
  return value === undefined || value === null ? null : String(value)
}

// =============================================================================
// Presentation
// =============================================================================

/**
 * Human-readable description of a breaking change
 *
 * @example
 * ```typescript
 * describeChange({ changeType: 'column_removed', element: 'pop' })
 * // "Column 'pop' removed"
 * ```
 */
export function describeChange(change: BreakingChange): string {
  const { element } = change
  const from = change.oldValue ?? 'null'
  const to = change.newValue ?? 'null'
  switch (change.changeType) {
    case 'format_changed':
      return `Format changed: ${from} -> ${to}`
    case 'crs_changed':
      return `CRS changed: ${from} -> ${to}`
    case 'column_removed':
      return `Column '${element}' removed`
    case 'band_removed':
      return `Band '${element}' removed`
    case 'type_changed':
      return `Column '${element}' type changed: ${from} -> ${to}`
    case 'data_type_changed':
      return `Band '${element}' data_type changed: ${from} -> ${to}`
    case 'geometry_type_changed':
      return `Column '${element}' geometry_type changed: ${from} -> ${to}`
    case 'column_crs_changed':
      return `Column '${element}' CRS changed: ${from} -> ${to}`
    case 'nullability_narrowed':
      return `Column '${element}' is no longer nullable`
    case 'nodata_changed':
      return `Band '${element}' nodata changed: ${from} -> ${to}`
  }
}
