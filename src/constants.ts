/**
 * Application-wide constants.
 */

// =============================================================================
// Files
// =============================================================================

/** `<index>-partitions.json` */
export const PARTITION_FILE_SUFFIX = '-partitions.json';

/** `<index>-<partition>-documents.jsonl` */
export const DOCUMENTS_FILE_SUFFIX = '-documents.jsonl';

/** Rotated log files kept next to the current one */
export const DEFAULT_MAX_LOG_FILES = 5;

// =============================================================================
// Display
// =============================================================================

/** Width for separator lines */
export const SEPARATOR_LENGTH = 60;

/** Partitions visible at once in the interactive picker */
export const PICKER_PAGE_SIZE = 15;

/** Interval for updating speed display in progress bar (ms) */
export const SPEED_UPDATE_INTERVAL_MS = 500;

/** Interval for flushing batched progress bar increments (ms) */
export const PROGRESS_FLUSH_INTERVAL_MS = 50;

// =============================================================================
// Environment
// =============================================================================

/** Read when --admin-key is not given */
export const ADMIN_KEY_ENV = 'SEARCH_ADMIN_KEY';
