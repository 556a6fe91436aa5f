/**
 * Shared types for the sync module
 *
 * Kept apart from planner.ts, push.ts and pull.ts so the executors and the
 * orchestrator can share them without import cycles.
 */

import type { Ledger } from '../versioning/types'
import type { ObjectStore } from '../types/storage'

// =============================================================================
// Remote state
// =============================================================================

/**
 * A snapshot of the remote ledger, taken once per push or pull
 */
export interface RemoteState {
  readonly ledger: Ledger
  /** ETag of the ledger object read; null when it does not exist */
  readonly etag: string | null
  readonly exists: boolean
}

// =============================================================================
// Plans
// =============================================================================

export type SyncStatus = 'up_to_date' | 'remote_ahead' | 'local_ahead' | 'diverged'

/**
 * One asset to move between the working copy and the remote
 */
export interface AssetTransfer {
  readonly name: string
  readonly sha256: string
  readonly sizeBytes: number
  readonly href: string
  readonly mtime?: number | undefined
}

/**
 * Relationship between a local and a remote ledger
 */
export interface SyncPlan {
  readonly status: SyncStatus
  /** Diverged with no shared history at all */
  readonly inconsistent: boolean
  /** Number of leading entries identical on both sides */
  readonly commonLength: number
  readonly commonVersion: string | null
  readonly localVersion: string | null
  readonly remoteVersion: string | null
  /** Versions past the common prefix, local side */
  readonly localOnly: readonly string[]
  /** Versions past the common prefix, remote side */
  readonly remoteOnly: readonly string[]
  readonly toPush: readonly AssetTransfer[]
  readonly toPull: readonly AssetTransfer[]
}

// =============================================================================
// Executor options
// =============================================================================

export interface TransferProgress {
  direction: 'upload' | 'download'
  asset: string
  completed: number
  total: number
  skipped: boolean
}

export type ProgressCallback = (progress: TransferProgress) => void

/**
 * Options shared by push and pull
 */
export interface TransferOptions {
  catalogRoot: string
  collection: string
  store: ObjectStore
  force?: boolean | undefined
  dryRun?: boolean | undefined
  /** Parallel transfers (default 4) */
  concurrency?: number | undefined
  onProgress?: ProgressCallback | undefined
}
