/**
 * Schema fingerprints
 *
 * A fingerprint is the small structural digest of a dataset's schema that is
 * recorded with every version: column names, types, nullability and CRS for
 * vector data; band names, data types and nodata for raster data. It is what
 * the breaking-change detector compares.
 *
 * In memory the model is camelCase; on disk (inside versions.json) it is
 * snake_case, and non-finite nodata values are written as strings because
 * JSON has no literal for them.
 *
 * @module schema/types
 */

import { z } from 'zod'

// =============================================================================
// Model
// =============================================================================

/**
 * One column of a vector (GeoParquet-style) dataset
 */
export interface ColumnSchema {
  name: string
  type: string
  nullable: boolean
  geometryType?: string | null | undefined
  crs?: string | null | undefined
  description?: string | undefined
  unit?: string | undefined
  semanticType?: string | undefined
}

/**
 * One band of a raster (COG-style) dataset
 */
export interface BandSchema {
  name: string
  dataType: string
  /** May be NaN or +/-Infinity */
  nodata?: number | null | undefined
  description?: string | undefined
  unit?: string | undefined
}

export interface VectorFingerprint {
  kind: 'vector'
  fingerprint: {
    crs: string | null
    columns: ColumnSchema[]
  }
}

export interface RasterFingerprint {
  kind: 'raster'
  fingerprint: {
    crs: string | null
    bands: BandSchema[]
  }
}

export type SchemaFingerprint = VectorFingerprint | RasterFingerprint

export type SchemaKind = SchemaFingerprint['kind']

/**
 * Fingerprint of a vector dataset with no known columns
 */
export function emptyFingerprint(): VectorFingerprint {
  return { kind: 'vector', fingerprint: { crs: null, columns: [] } }
}

// =============================================================================
// On-disk shape
// =============================================================================

const NodataJsonSchema = z.union([z.number(), z.enum(['nan', 'inf', '-inf']), z.null()])

const ColumnJsonSchema = z.object({
  name: z.string(),
  type: z.string(),
  nullable: z.boolean(),
  geometry_type: z.string().nullable().optional(),
  crs: z.string().nullable().optional(),
  description: z.string().optional(),
  unit: z.string().optional(),
  semantic_type: z.string().optional(),
})

const BandJsonSchema = z.object({
  name: z.string(),
  data_type: z.string(),
  nodata: NodataJsonSchema.optional(),
  description: z.string().optional(),
  unit: z.string().optional(),
})

export const SchemaFingerprintJsonSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('vector'),
    fingerprint: z.object({
      crs: z.string().nullable().default(null),
      columns: z.array(ColumnJsonSchema),
    }),
  }),
  z.object({
    kind: z.literal('raster'),
    fingerprint: z.object({
      crs: z.string().nullable().default(null),
      bands: z.array(BandJsonSchema),
    }),
  }),
])

export type SchemaFingerprintJson = z.infer<typeof SchemaFingerprintJsonSchema>
type NodataJson = z.infer<typeof NodataJsonSchema>

// =============================================================================
// Codec
// =============================================================================

function nodataToJSON(value: number | null | undefined): NodataJson | undefined {
  if (value === undefined || value === null) return value
  if (Number.isNaN(value)) return 'nan'
  if (value === Infinity) return 'inf'
  if (value === -Infinity) return '-inf'
  return value
}

function nodataFromJSON(value: NodataJson | undefined): number | null | undefined {
  switch (value) {
    case 'nan':
      return NaN
    case 'inf':
      return Infinity
    case '-inf':
      return -Infinity
    default:
      return value
  }
}

/**
 * Convert a fingerprint to its on-disk (snake_case) form
 */
export function fingerprintToJSON(schema: SchemaFingerprint): SchemaFingerprintJson {
  if (schema.kind === 'vector') {
    return {
      kind: 'vector',
      fingerprint: {
        crs: schema.fingerprint.crs,
        columns: schema.fingerprint.columns.map(c => ({
          name: c.name,
          type: c.type,
          nullable: c.nullable,
          geometry_type: c.geometryType,
          crs: c.crs,
          description: c.description,
          unit: c.unit,
          semantic_type: c.semanticType,
        })),
      },
    }
  }
  return {
    kind: 'raster',
    fingerprint: {
      crs: schema.fingerprint.crs,
      bands: schema.fingerprint.bands.map(b => ({
        name: b.name,
        data_type: b.dataType,
        nodata: nodataToJSON(b.nodata),
        description: b.description,
        unit: b.unit,
      })),
    },
  }
}

/**
 * Convert an already-validated on-disk fingerprint to the in-memory model
 */
export function fingerprintFromJSON(json: SchemaFingerprintJson): SchemaFingerprint {
  if (json.kind === 'vector') {
    return {
      kind: 'vector',
      fingerprint: {
        crs: json.fingerprint.crs,
        columns: json.fingerprint.columns.map(c => ({
          name: c.name,
          type: c.type,
          nullable: c.nullable,
          geometryType: c.geometry_type,
          crs: c.crs,
          description: c.description,
          unit: c.unit,
          semanticType: c.semantic_type,
        })),
      },
    }
  }
  return {
    kind: 'raster',
    fingerprint: {
      crs: json.fingerprint.crs,
      bands: json.fingerprint.bands.map(b => ({
        name: b.name,
        dataType: b.data_type,
        nodata: nodataFromJSON(b.nodata),
        description: b.description,
        unit: b.unit,
      })),
    },
  }
}

/**
 * Validate and convert an arbitrary parsed JSON value into a fingerprint
 *
 * @throws z.ZodError when the value is not a fingerprint
 */
export function parseFingerprint(value: unknown): SchemaFingerprint {
  return fingerprintFromJSON(SchemaFingerprintJsonSchema.parse(value))
}
