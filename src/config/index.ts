/**
 * Catalog configuration
 *
 * `.catalog-sync/config.yaml` holds catalog-level settings and an optional
 * per-collection override section:
 *
 * ```yaml
 * remote: file:///mnt/shared/catalog
 * concurrency: 8
 * collections:
 *   imagery:
 *     concurrency: 2
 * ```
 *
 * Resolution order for a setting: CLI value, then the CATALOG_SYNC_<KEY>
 * environment variable, then the collection section, then the catalog level.
 *
 * @module config
 */

import { promises as fs } from 'node:fs'
import * as yaml from 'yaml'
import { z } from 'zod'
import { ConfigurationError, hasErrorCode } from '../errors'
import { writeFileAtomic } from '../utils/atomic-write'
import { managementPath } from '../catalog/state'
import { CONFIG_FILENAME, DEFAULT_TRANSFER_CONCURRENCY, ENV_PREFIX } from '../constants'

// =============================================================================
// Schema
// =============================================================================

const SettingsSchema = z.object({
  remote: z.string().min(1).optional(),
  concurrency: z.number().int().positive().optional(),
})

const ConfigSchema = SettingsSchema.extend({
  collections: z.record(SettingsSchema).optional(),
})

export type Settings = z.infer<typeof SettingsSchema>
export type CatalogConfig = z.infer<typeof ConfigSchema>

export const SETTING_KEYS = ['remote', 'concurrency'] as const
export type SettingKey = (typeof SETTING_KEYS)[number]

/**
 * Narrow an arbitrary string to a known setting key
 */
export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some(k => k === key)
}

// =============================================================================
// File access
// =============================================================================

/**
 * Path of the config file for a catalog
 */
export function configPath(catalogRoot: string): string {
  return managementPath(catalogRoot, CONFIG_FILENAME)
}

/**
 * Load and validate the config file; a missing or empty file is `{}`
 *
 * @throws ConfigurationError for invalid YAML or unknown value types
 */
export async function loadConfig(catalogRoot: string): Promise<CatalogConfig> {
  const path = configPath(catalogRoot)
  let text: string
  try {
    text = await fs.readFile(path, 'utf-8')
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) {
      return {}
    }
    throw error
  }

  let value: unknown
  try {
    value = yaml.parse(text)
  } catch (error: unknown) {
    throw new ConfigurationError(
      `Invalid YAML in ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path }
    )
  }
  if (value === null || value === undefined) {
    return {}
  }

  const parsed = ConfigSchema.safeParse(value)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid configuration in ${path}: ${detail}`, { path })
  }
  return parsed.data
}

/**
 * Write the config file atomically
 */
export async function saveConfig(catalogRoot: string, config: CatalogConfig): Promise<void> {
  await writeFileAtomic(configPath(catalogRoot), yaml.stringify(config))
}

// =============================================================================
// Values
// =============================================================================

/**
 * Parse a concurrency value
 *
 * @throws ConfigurationError unless it is a positive integer
 */
export function parseConcurrency(raw: string | number, source = 'concurrency'): number {
  const value = typeof raw === 'number' ? raw : Number(raw.trim())
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${source} must be a positive integer, got "${String(raw)}"`, { source })
  }
  return value
}

function applySetting(settings: Settings, key: SettingKey, value: string): Settings {
  if (key === 'concurrency') {
    return { ...settings, concurrency: parseConcurrency(value) }
  }
  return { ...settings, remote: value }
}

export interface SetSettingOptions {
  collection?: string | undefined
}

/**
 * Set one setting, at catalog level or for a collection, and save
 */
export async function setSetting(
  catalogRoot: string,
  key: SettingKey,
  value: string,
  options: SetSettingOptions = {}
): Promise<CatalogConfig> {
  const config = await loadConfig(catalogRoot)
  let next: CatalogConfig
  if (options.collection !== undefined) {
    const collections = config.collections ?? {}
    const section = collections[options.collection] ?? {}
    next = {
      ...config,
      collections: { ...collections, [options.collection]: applySetting(section, key, value) },
    }
  } else {
    next = { ...applySetting(config, key, value), collections: config.collections }
  }
  await saveConfig(catalogRoot, next)
  return next
}

export interface ResolveOptions {
  catalogRoot: string
  collection?: string | undefined
  cliValue?: string | undefined
  /** Defaults to process.env */
  env?: Record<string, string | undefined> | undefined
}

/**
 * Environment variable consulted for a setting
 *
 * @example
 * envVarName('concurrency') // 'CATALOG_SYNC_CONCURRENCY'
 */
export function envVarName(key: SettingKey): string {
  return `${ENV_PREFIX}_${key.toUpperCase()}`
}

/**
 * Resolve a setting's value as a string, or undefined when nothing sets it
 */
export async function resolveSetting(key: SettingKey, options: ResolveOptions): Promise<string | undefined> {
  if (options.cliValue !== undefined) {
    return options.cliValue
  }

  const env = options.env ?? process.env
  const fromEnv = env[envVarName(key)]
  if (fromEnv !== undefined && fromEnv !== '') {
    return fromEnv
  }

  const config = await loadConfig(options.catalogRoot)
  const section = options.collection !== undefined ? config.collections?.[options.collection] : undefined
  const value = section?.[key] ?? config[key]
  return value === undefined ? undefined : String(value)
}

/**
 * Resolve the transfer concurrency, defaulting to 4
 *
 * @throws ConfigurationError when the resolved value is not a positive integer
 */
export async function resolveConcurrency(options: ResolveOptions): Promise<number> {
  const raw = await resolveSetting('concurrency', options)
  return raw === undefined ? DEFAULT_TRANSFER_CONCURRENCY : parseConcurrency(raw)
}
