/**
 * Default scan and check collaborators for sync
 *
 * The orchestrator only depends on the Scanner and Checker interfaces;
 * these implementations list files under the catalog root and classify them
 * by extension.
 *
 * @module catalog/scan
 */

import { promises as fs } from 'node:fs'
import type { Dirent } from 'node:fs'
import { join, relative } from 'node:path'
import { toHref } from '../utils/fs-path-safety'
import { hasErrorCode } from '../errors'
import { LEDGER_FILENAME, MANAGEMENT_DIR } from '../constants'

// =============================================================================
// Interfaces
// =============================================================================

/**
 * Lists the data files of a catalog as hrefs relative to its root
 */
export interface Scanner {
  scan(catalogRoot: string): Promise<string[]>
}

export type FileClass = 'cloud_native' | 'convertible' | 'unsupported' | 'auxiliary'

export interface CheckOptions {
  /** Convert convertible files when a converter is available */
  fix?: boolean | undefined
  dryRun?: boolean | undefined
}

export interface CheckReport {
  cloudNative: string[]
  convertible: string[]
  unsupported: string[]
  auxiliary: string[]
  /** Files converted by the checker */
  fixed: string[]
}

/**
 * Classifies scanned files and optionally converts them
 */
export interface Checker {
  check(catalogRoot: string, files: string[], options?: CheckOptions): Promise<CheckReport>
}

// =============================================================================
// Directory scanner
// =============================================================================

/**
 * Walks the catalog root, skipping the management directory, hidden entries
 * and ledger files
 */
export const directoryScanner: Scanner = {
  async scan(catalogRoot: string): Promise<string[]> {
    const files: string[] = []

    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[]
      try {
        entries = await fs.readdir(dir, { withFileTypes: true })
      } catch (error: unknown) {
        if (hasErrorCode(error, 'ENOENT')) return
        throw error
      }
      for (const entry of entries) {
        if (entry.name.startsWith('.') || entry.name === MANAGEMENT_DIR) continue
        const fullPath = join(dir, entry.name)
        if (entry.isDirectory()) {
          await walk(fullPath)
        } else if (entry.isFile() && entry.name !== LEDGER_FILENAME) {
          files.push(toHref(relative(catalogRoot, fullPath)))
        }
      }
    }

    await walk(catalogRoot)
    return files.sort()
  },
}

// =============================================================================
// Extension checker
// =============================================================================

const CLOUD_NATIVE_EXTENSIONS = ['.parquet', '.fgb', '.pmtiles', '.raquet', '.tif', '.tiff', '.copc.laz']
const CONVERTIBLE_EXTENSIONS = ['.shp', '.geojson', '.gpkg', '.csv', '.jp2']
const AUXILIARY_EXTENSIONS = ['.json', '.md', '.txt', '.yaml', '.yml', '.xml', '.dbf', '.shx', '.prj', '.cpg']

/**
 * Classify a file by extension (case-insensitive)
 *
 * @example
 * classifyFile('roads/data.parquet')   // 'cloud_native'
 * classifyFile('points/cloud.copc.laz') // 'cloud_native'
 * classifyFile('roads/roads.shp')      // 'convertible'
 * classifyFile('grid/model.nc')        // 'unsupported'
 */
export function classifyFile(href: string): FileClass {
  const name = href.toLowerCase()
  const matches = (extensions: string[]): boolean => extensions.some(ext => name.endsWith(ext))
  if (matches(CLOUD_NATIVE_EXTENSIONS)) return 'cloud_native'
  if (matches(CONVERTIBLE_EXTENSIONS)) return 'convertible'
  if (matches(AUXILIARY_EXTENSIONS)) return 'auxiliary'
  return 'unsupported'
}

/**
 * Classifies files by extension; conversion is not available, so `fix`
 * reports convertible files without touching them
 */
export const extensionChecker: Checker = {
  async check(_catalogRoot: string, files: string[]): Promise<CheckReport> {
    const report: CheckReport = { cloudNative: [], convertible: [], unsupported: [], auxiliary: [], fixed: [] }
    for (const file of files) {
      switch (classifyFile(file)) {
        case 'cloud_native':
          report.cloudNative.push(file)
          break
        case 'convertible':
          report.convertible.push(file)
          break
        case 'auxiliary':
          report.auxiliary.push(file)
          break
        case 'unsupported':
          report.unsupported.push(file)
          break
      }
    }
    return report
  },
}
