/**
 * Shared constants used across the packlens codebase.
 */

// ============================================================================
// Binary Detection
// ============================================================================

/**
 * Number of bytes to check when detecting binary content.
 * Matches Git's heuristic of checking the first 8000 bytes for null bytes.
 */
export const BINARY_CHECK_BYTES = 8000

// ============================================================================
// Object Format
// ============================================================================

/** Length of a raw SHA-1 object id */
export const OBJECT_ID_BYTES = 20

/** Fixed pack header: signature, version, object count */
export const PACK_HEADER_SIZE = 12

/** Trailing SHA-1 over the whole pack */
export const PACK_CHECKSUM_SIZE = 20

/** Pack versions accepted by the decoder */
export const SUPPORTED_PACK_VERSIONS: readonly number[] = [2, 3]

/** Longest delta chain followed before giving up */
export const MAX_DELTA_CHAIN_DEPTH = 4096

// ============================================================================
// Display
// ============================================================================

/** Bytes of a blob or resolved entry shown before truncating the preview */
export const DEFAULT_MAX_PREVIEW_BYTES = 64 * 1024

/** Terminal size assumed when the real one cannot be read */
export const DEFAULT_TERMINAL_WIDTH = 80
export const DEFAULT_TERMINAL_HEIGHT = 24

/** Rows taken by the title bar and the hint strip */
export const CHROME_ROWS = 3

/** Smallest tree list height, even in a very short terminal */
export const MIN_LIST_HEIGHT = 3

// ============================================================================
// Environment
// ============================================================================

export const ENV_LOG_LEVEL = 'PACKLENS_LOG_LEVEL'
export const ENV_LOG_FILE = 'PACKLENS_LOG_FILE'
export const ENV_SORT = 'PACKLENS_SORT'
export const ENV_MAX_PREVIEW_BYTES = 'PACKLENS_MAX_PREVIEW_BYTES'
export const ENV_NO_COLOR = 'NO_COLOR'
