/**
 * Breaking change detection tests
 */

import { describe, it, expect } from 'vitest'
import {
  describeChange,
  detectBreakingChanges,
  fingerprintsEqual,
  isBreaking,
  nodataEqual,
} from '../../src/schema/breaking'
import type { ColumnSchema, RasterFingerprint, VectorFingerprint, BandSchema } from '../../src/schema/types'

function vector(columns: ColumnSchema[], crs: string | null = 'EPSG:4326'): VectorFingerprint {
  return { kind: 'vector', fingerprint: { crs, columns } }
}

function raster(bands: BandSchema[], crs: string | null = 'EPSG:3857'): RasterFingerprint {
  return { kind: 'raster', fingerprint: { crs, bands } }
}

const id: ColumnSchema = { name: 'id', type: 'int64', nullable: false }
const geom: ColumnSchema = { name: 'geom', type: 'binary', nullable: true, geometryType: 'Point', crs: 'EPSG:4326' }
const name: ColumnSchema = { name: 'name', type: 'string', nullable: true }

describe('detectBreakingChanges (vector)', () => {
  it('should report nothing for identical schemas', () => {
    expect(detectBreakingChanges(vector([id, geom]), vector([id, geom]))).toEqual([])
  })

  it('should treat added columns and widened nullability as compatible', () => {
    const widened = { ...id, nullable: true }
    expect(isBreaking(vector([id]), vector([widened, name]))).toBe(false)
  })

  it('should ignore description, unit and semantic type', () => {
    const annotated = { ...name, description: 'Street name', unit: 'text', semanticType: 'label' }
    expect(isBreaking(vector([name]), vector([annotated]))).toBe(false)
  })

  it('should report removed columns', () => {
    expect(detectBreakingChanges(vector([id, name]), vector([id]))).toEqual([
      { changeType: 'column_removed', element: 'name' },
    ])
  })

  it('should report type, geometry, column CRS and nullability changes in order', () => {
    const changed: ColumnSchema = {
      name: 'geom',
      type: 'string',
      nullable: false,
      geometryType: 'Polygon',
      crs: 'EPSG:3857',
    }
    expect(detectBreakingChanges(vector([geom]), vector([changed]))).toEqual([
      { changeType: 'type_changed', element: 'geom', oldValue: 'binary', newValue: 'string' },
      { changeType: 'geometry_type_changed', element: 'geom', oldValue: 'Point', newValue: 'Polygon' },
      { changeType: 'column_crs_changed', element: 'geom', oldValue: 'EPSG:4326', newValue: 'EPSG:3857' },
      { changeType: 'nullability_narrowed', element: 'geom', oldValue: 'nullable', newValue: 'not null' },
    ])
  })

  it('should not report a geometry type or CRS gained where none was set', () => {
    const plain: ColumnSchema = { name: 'geom', type: 'binary', nullable: true }
    expect(detectBreakingChanges(vector([plain]), vector([geom]))).toEqual([])
  })

  it('should report a dataset CRS change', () => {
    expect(detectBreakingChanges(vector([id], 'EPSG:4326'), vector([id], null))).toEqual([
      { changeType: 'crs_changed', element: 'schema', oldValue: 'EPSG:4326', newValue: null },
    ])
  })
})

describe('detectBreakingChanges (raster)', () => {
  it('should report removed bands and data type changes', () => {
    const old = raster([
      { name: 'red', dataType: 'uint8' },
      { name: 'nir', dataType: 'uint8' },
    ])
    const next = raster([{ name: 'red', dataType: 'uint16' }])
    expect(detectBreakingChanges(old, next)).toEqual([
      { changeType: 'data_type_changed', element: 'red', oldValue: 'uint8', newValue: 'uint16' },
      { changeType: 'band_removed', element: 'nir' },
    ])
  })

  it('should compare nodata with NaN equal to NaN', () => {
    const old = raster([{ name: 'dem', dataType: 'float32', nodata: NaN }])
    expect(detectBreakingChanges(old, raster([{ name: 'dem', dataType: 'float32', nodata: NaN }]))).toEqual([])
    expect(detectBreakingChanges(old, raster([{ name: 'dem', dataType: 'float32', nodata: -9999 }]))).toEqual([
      { changeType: 'nodata_changed', element: 'dem', oldValue: 'NaN', newValue: '-9999' },
    ])
  })
})

describe('detectBreakingChanges (format)', () => {
  it('should report a kind change alone', () => {
    expect(detectBreakingChanges(vector([id]), raster([]))).toEqual([
      { changeType: 'format_changed', element: 'format', oldValue: 'vector', newValue: 'raster' },
    ])
  })
})

describe('helpers', () => {
  it('should treat absent nodata as null', () => {
    expect(nodataEqual(undefined, null)).toBe(true)
    expect(nodataEqual(null, 0)).toBe(false)
    expect(nodataEqual(Infinity, Infinity)).toBe(true)
  })

  it('should compare fingerprints including metadata', () => {
    expect(fingerprintsEqual(vector([name]), vector([{ ...name }]))).toBe(true)
    expect(fingerprintsEqual(vector([name]), vector([{ ...name, unit: 'm' }]))).toBe(false)
  })

  it.each([
    [{ changeType: 'format_changed', element: 'format', oldValue: 'vector', newValue: 'raster' }, 'Format changed: vector -> raster'],
    [{ changeType: 'crs_changed', element: 'schema', oldValue: 'EPSG:4326', newValue: null }, 'CRS changed: EPSG:4326 -> null'],
    [{ changeType: 'column_removed', element: 'pop' }, "Column 'pop' removed"],
    [{ changeType: 'band_removed', element: 'nir' }, "Band 'nir' removed"],
    [{ changeType: 'type_changed', element: 'id', oldValue: 'int32', newValue: 'int64' }, "Column 'id' type changed: int32 -> int64"],
    [{ changeType: 'nullability_narrowed', element: 'id', oldValue: 'nullable', newValue: 'not null' }, "Column 'id' is no longer nullable"],
    [{ changeType: 'nodata_changed', element: 'dem', oldValue: null, newValue: '0' }, "Band 'dem' nodata changed: null -> 0"],
  ] as const)('should describe %o', (change, expected) => {
    expect(describeChange(change)).toBe(expected)
  })
})
