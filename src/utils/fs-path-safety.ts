/**
 * Filesystem Path Safety Utilities
 *
 * Asset hrefs come from ledgers that may have been written by another
 * client, so every href is validated before it is joined onto a local
 * catalog root or a filesystem-backed store root.
 *
 * @module utils/fs-path-safety
 */

import { resolve, isAbsolute, relative, sep } from 'node:path'
import { PathTraversalError } from '../storage/errors'

/**
 * Characters that are never valid in an href
 */
const DANGEROUS_CHARACTERS = ['\0', '\n', '\r']

/**
 * Check if a path contains dangerous characters.
 *
 * @example
 * hasDangerousCharacters('file.txt')    // false
 * hasDangerousCharacters('file\0.txt')  // true
 */
export function hasDangerousCharacters(filePath: string): boolean {
  return DANGEROUS_CHARACTERS.some(char => filePath.includes(char))
}

/**
 * Check if a path contains a `..` segment (either separator).
 *
 * @example
 * hasPathTraversal('data/file.txt')   // false
 * hasPathTraversal('data/../secret')  // true
 */
export function hasPathTraversal(filePath: string): boolean {
  return filePath.replace(/\\/g, '/').split('/').some(part => part === '..')
}

/**
 * Check if a path is absolute on either POSIX or Windows.
 */
export function isAbsoluteHref(filePath: string): boolean {
  return filePath.startsWith('/') || filePath.startsWith('\\') || /^[A-Za-z]:/.test(filePath)
}

/**
 * Check if a file path escapes a base directory after resolution.
 *
 * @example
 * escapesBaseDirectory('/srv/catalog', 'roads/data.parquet')  // false
 * escapesBaseDirectory('/srv/catalog', '../other/file.txt')   // true
 */
export function escapesBaseDirectory(basePath: string, filePath: string): boolean {
  const relativePath = relative(resolve(basePath), resolve(basePath, filePath))
  return relativePath.startsWith('..') || isAbsolute(relativePath)
}

/**
 * Resolve a relative href under `root`, rejecting anything that could land
 * outside it.
 *
 * @throws PathTraversalError for absolute hrefs, `..` segments, control
 * characters, or a resolved path outside `root`
 *
 * @example
 * resolveWithin('/srv/catalog', 'roads/data.parquet') // '/srv/catalog/roads/data.parquet'
 * resolveWithin('/srv/catalog', '../etc/passwd')      // throws
 */
export function resolveWithin(root: string, href: string): string {
  if (
    href.length === 0 ||
    hasDangerousCharacters(href) ||
    isAbsoluteHref(href) ||
    hasPathTraversal(href) ||
    escapesBaseDirectory(root, href)
  ) {
    throw new PathTraversalError(href)
  }
  const resolvedRoot = resolve(root)
  const resolved = resolve(resolvedRoot, href)
  if (resolved !== resolvedRoot && !resolved.startsWith(resolvedRoot + sep)) {
    throw new PathTraversalError(href)
  }
  return resolved
}

/**
 * Convert an OS path relative to some root into a POSIX href
 */
export function toHref(relativePath: string): string {
  return relativePath.split(sep).join('/')
}
