/**
 * catalog-sync Constants
 *
 * Centralized constants used throughout the codebase.
 */

// =============================================================================
// Ledger
// =============================================================================

/**
 * Format version written into every versions.json
 */
export const LEDGER_SPEC_VERSION = '1.0.0'

/**
 * Ledger file name, one per collection directory
 */
export const LEDGER_FILENAME = 'versions.json'

/**
 * First version recorded for a collection
 */
export const INITIAL_VERSION = '1.0.0'

// =============================================================================
// Checksums
// =============================================================================

/**
 * Read size used when streaming a file through SHA-256
 */
export const CHECKSUM_CHUNK_SIZE = 8192

/**
 * Maximum mtime difference (seconds) still treated as "unchanged"
 * Absorbs float rounding of sub-millisecond timestamps
 */
export const MTIME_TOLERANCE_SECONDS = 0.001

// =============================================================================
// Concurrency
// =============================================================================

/**
 * Default number of concurrent asset transfers in push/pull
 */
export const DEFAULT_TRANSFER_CONCURRENCY = 4

/**
 * Stale lock age threshold in milliseconds (30 seconds)
 */
export const STALE_LOCK_AGE_MS = 30000

/**
 * Attempts to acquire a conditional-write lock before giving up
 */
export const LOCK_MAX_RETRIES = 10

/**
 * Base backoff between lock attempts in milliseconds
 */
export const LOCK_BASE_DELAY_MS = 10

// =============================================================================
// Catalog layout
// =============================================================================

/**
 * Management directory at the catalog root
 */
export const MANAGEMENT_DIR = '.catalog-sync'

/**
 * Configuration file inside the management directory
 */
export const CONFIG_FILENAME = 'config.yaml'

/**
 * State marker inside the management directory, written last by init
 */
export const STATE_FILENAME = 'state.json'

/**
 * Root STAC catalog document
 */
export const ROOT_CATALOG_FILENAME = 'catalog.json'

/**
 * Directory under a collection holding content-addressed objects on the remote
 */
export const OBJECTS_DIR = 'objects'

// =============================================================================
// Configuration
// =============================================================================

/**
 * Prefix for environment variable overrides (CATALOG_SYNC_REMOTE, ...)
 */
export const ENV_PREFIX = 'CATALOG_SYNC'
