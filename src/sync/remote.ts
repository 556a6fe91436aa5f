import type { ObjectStore } from '../types/storage'
import type { RemoteState } from './types'
import { decodeLedger, emptyLedger } from '../versioning/ledger'
import { isObjectNotFoundError } from '../storage/errors'
import { ledgerKey } from './layout'

/**
 * Fetch the remote ledger and its ETag
 *
 * An absent ledger is an empty one with a null ETag, so a conditional write
 * against it requires the key to still be absent.
 */
export async function fetchRemoteState(store: ObjectStore, collection: string): Promise<RemoteState> {
  const key = ledgerKey(collection)
  try {
    const { data, etag } = await store.get(key)
    return { ledger: decodeLedger(data, `${store.type}:${key}`), etag, exists: true }
  } catch (error: unknown) {
    if (isObjectNotFoundError(error)) {
      return { ledger: emptyLedger(), etag: null, exists: false }
    }
    throw error
  }
}
