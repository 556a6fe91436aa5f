/**
 * Catalog detection and initialization
 *
 * A directory is MANAGED once both `.catalog-sync/config.yaml` and
 * `.catalog-sync/state.json` exist. Initialization writes state.json last,
 * so an interrupted init leaves the directory FRESH and safe to retry.
 *
 * @module catalog/state
 */

import { promises as fs } from 'node:fs'
import { basename, join, resolve } from 'node:path'
import { CatalogStateError, hasErrorCode } from '../errors'
import { writeFileAtomic } from '../utils/atomic-write'
import { logger } from '../utils/logger'
import { CONFIG_FILENAME, MANAGEMENT_DIR, ROOT_CATALOG_FILENAME, STATE_FILENAME } from '../constants'

export enum CatalogState {
  /** Nothing here yet */
  FRESH = 'fresh',
  /** Initialized by this tool */
  MANAGED = 'managed',
  /** A STAC catalog this tool did not create */
  UNMANAGED_STAC = 'unmanaged_stac',
}

export interface InitOptions {
  title?: string | undefined
  description?: string | undefined
}

export interface InitResult {
  /** False when the catalog was already managed */
  created: boolean
  catalogFile: string
}

const DEFAULT_DESCRIPTION = 'A catalog-sync managed STAC catalog'

/**
 * Path of a file inside the management directory
 */
export function managementPath(catalogRoot: string, file: string): string {
  return join(catalogRoot, MANAGEMENT_DIR, file)
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isFile()
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      return false
    }
    throw error
  }
}

/**
 * Classify a directory by which marker files exist
 */
export async function detectCatalogState(catalogRoot: string): Promise<CatalogState> {
  const [hasConfig, hasState] = await Promise.all([
    fileExists(managementPath(catalogRoot, CONFIG_FILENAME)),
    fileExists(managementPath(catalogRoot, STATE_FILENAME)),
  ])
  if (hasConfig && hasState) {
    return CatalogState.MANAGED
  }
  if (await fileExists(join(catalogRoot, ROOT_CATALOG_FILENAME))) {
    return CatalogState.UNMANAGED_STAC
  }
  return CatalogState.FRESH
}

/**
 * Catalog id derived from a directory name
 *
 * @example
 * catalogId('My Catalog!') // 'my-catalog'
 */
export function catalogId(directoryName: string): string {
  const id = directoryName
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '')
  return id.length > 0 ? id : 'catalog'
}

/**
 * Initialize a catalog
 *
 * Writes, in order: config.yaml (empty), the root catalog.json (unless one
 * exists), state.json. A MANAGED catalog is left as it is.
 *
 * @throws CatalogStateError for an unmanaged STAC catalog
 */
export async function initCatalog(catalogRoot: string, options: InitOptions = {}): Promise<InitResult> {
  const root = resolve(catalogRoot)
  const catalogFile = join(root, ROOT_CATALOG_FILENAME)
  await fs.mkdir(root, { recursive: true })

  const state = await detectCatalogState(root)
  if (state === CatalogState.MANAGED) {
    return { created: false, catalogFile }
  }
  // config.yaml without state.json is an interrupted init of ours
  const partial = await fileExists(managementPath(root, CONFIG_FILENAME))
  if (state === CatalogState.UNMANAGED_STAC && !partial) {
    throw new CatalogStateError(
      `${root} already holds a STAC catalog not managed by catalog-sync; use --force to sync it anyway`,
      { catalogRoot: root, state }
    )
  }

  if (!partial) {
    await writeFileAtomic(managementPath(root, CONFIG_FILENAME), '')
  }

  if (!(await fileExists(catalogFile))) {
    const catalog = {
      type: 'Catalog',
      stac_version: '1.0.0',
      id: catalogId(basename(root)),
      ...(options.title !== undefined ? { title: options.title } : {}),
      description: options.description ?? DEFAULT_DESCRIPTION,
      links: [],
    }
    await writeFileAtomic(catalogFile, JSON.stringify(catalog, null, 2) + '\n')
  }

  await writeFileAtomic(managementPath(root, STATE_FILENAME), '{}\n')
  logger.info(`Initialized catalog at ${root}`)
  return { created: true, catalogFile }
}
