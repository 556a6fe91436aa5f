/**
 * Remote key layout
 *
 *   <collection>/versions.json
 *   <collection>/objects/<first-2-chars>/<sha256>
 *
 * Asset objects are content-addressed, so re-uploading the same bytes
 * targets the same key.
 */

import { LEDGER_FILENAME, OBJECTS_DIR } from '../constants'

/**
 * Key of a collection's ledger in the remote store
 */
export function ledgerKey(collection: string): string {
  return `${collection}/${LEDGER_FILENAME}`
}

/**
 * Key of an asset object in the remote store
 *
 * @example
 * objectKey('roads', 'ab12...') // 'roads/objects/ab/ab12...'
 */
export function objectKey(collection: string, sha256: string): string {
  return `${collection}/${OBJECTS_DIR}/${sha256.slice(0, 2)}/${sha256}`
}
