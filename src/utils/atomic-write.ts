/**
 * Atomic file replacement
 *
 * Writes go to a temp file in the destination directory and are renamed
 * over the target, so readers observe either the old or the new contents.
 *
 * @module utils/atomic-write
 */

import { promises as fs } from 'node:fs'
import { dirname } from 'node:path'
import { logger } from './logger'
import { tempPathFor } from './random'

/**
 * Atomically write `data` to `path`, creating parent directories
 */
export async function writeFileAtomic(path: string, data: Uint8Array | string): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true })
  const tempPath = tempPathFor(path)
  try {
    await fs.writeFile(tempPath, data)
    await fs.rename(tempPath, path)
  } catch (error: unknown) {
    try {
      await fs.unlink(tempPath)
    } catch (cleanupError) {
      logger.debug(`Failed to clean up temp file ${tempPath}`, cleanupError)
    }
    throw error
  }
}
