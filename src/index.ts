/**
 * catalog-sync - versioning and synchronization for dataset catalogs
 *
 * @packageDocumentation
 */

// =============================================================================
// Versioning
// =============================================================================

export type { Asset, Version, Ledger, NewVersion } from './versioning/types'
export {
  addVersion,
  computeChanges,
  decodeLedger,
  emptyLedger,
  encodeLedger,
  latestVersion,
  ledgerFromJSON,
  ledgerPath,
  ledgerToJSON,
  readLedger,
  readLedgerOrEmpty,
  versionToJSON,
  writeLedger,
  type LedgerJson,
  type VersionJson,
  type AssetJson,
} from './versioning/ledger'
export {
  checksum,
  describeFile,
  findUncommittedChanges,
  isCurrent,
  isStale,
  isTracked,
  mtimeMatches,
  type FileState,
  type IsCurrentOptions,
  type Staleness,
  type StalenessReason,
} from './versioning/checksum'
export { compareVersions, isValidVersion, nextVersion, parseVersion } from './versioning/semver'
export { recordVersion, assetName, type RecordOptions, type RecordReport } from './versioning/record'

// =============================================================================
// Schema
// =============================================================================

export {
  emptyFingerprint,
  fingerprintFromJSON,
  fingerprintToJSON,
  parseFingerprint,
  type BandSchema,
  type ColumnSchema,
  type RasterFingerprint,
  type SchemaFingerprint,
  type SchemaKind,
  type VectorFingerprint,
} from './schema/types'
export {
  describeChange,
  detectBreakingChanges,
  fingerprintsEqual,
  isBreaking,
  type BreakingChange,
  type BreakingChangeType,
} from './schema/breaking'

// =============================================================================
// Sync
// =============================================================================

export type {
  AssetTransfer,
  ProgressCallback,
  RemoteState,
  SyncPlan,
  SyncStatus,
  TransferOptions,
  TransferProgress,
} from './sync/types'
export { commonPrefixLength, describePlan, entryHash, planSync } from './sync/planner'
export { fetchRemoteState } from './sync/remote'
export { ledgerKey, objectKey } from './sync/layout'
export { push, type PushOptions, type PushReport } from './sync/push'
export { pull, mergeLedgers, type PullOptions, type PullReport } from './sync/pull'
export {
  sync,
  clone,
  type CloneOptions,
  type CloneReport,
  type StageResult,
  type SyncOptions,
  type SyncReport,
  type SyncStage,
} from './sync/orchestrator'

// =============================================================================
// Catalog
// =============================================================================

export { CatalogState, detectCatalogState, initCatalog, type InitOptions } from './catalog/state'
export {
  classifyFile,
  directoryScanner,
  extensionChecker,
  type CheckReport,
  type Checker,
  type FileClass,
  type Scanner,
} from './catalog/scan'

// =============================================================================
// Config, Storage, Errors
// =============================================================================

export {
  loadConfig,
  resolveConcurrency,
  resolveSetting,
  saveConfig,
  setSetting,
  type CatalogConfig,
  type SettingKey,
  type Settings,
} from './config'

export * from './storage'
export * from './errors'

export type { Result, CatalogResult } from './types/result'
export { Ok, Err, isOk, isErr, unwrap, map } from './types/result'
export { logger, setLogger, consoleLogger, noopLogger, createLevelLogger, type Logger } from './utils/logger'
