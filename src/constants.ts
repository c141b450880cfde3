/**
 * Centralized constants for defaults, formats and limits.
 */

/** Default SQLite database path. */
export const DEFAULT_DATABASE = 'logs.db';

/** Default query radius in seconds around the target timestamp. */
export const DEFAULT_RANGE_SECONDS = 120;

/** Default glob used to discover log files in the ingest directory. */
export const LOG_FILE_PATTERN = '*.log';

/** Maximum log file size in bytes (256 MB); larger files are skipped. */
export const MAX_FILE_SIZE = 256 * 1024 * 1024;

/** Calendar date format accepted by --date (yyyy-MM-dd). */
export const DATE_FORMAT_DASHED = 'yyyy-MM-dd';

/** Canonical ISO rendering of a stored instant. */
export const ISO_TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss'Z'";

/** Human-readable rendering used in query banners. */
export const DISPLAY_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/** Formats accepted for the query target besides a plain epoch value. */
export const TARGET_TIMESTAMP_FORMATS = [
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm:ss'Z'",
  'yyyy-MM-dd HH:mm:ss',
] as const;

/** Regex pattern to match a calendar date (YYYY-MM-DD). */
export const DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Regex pattern to match an epoch-seconds target. */
export const EPOCH_REGEX = /^-?\d+$/;

/**
 * Regex pattern to find an embedded time of day (H:MM:SS.mmm or HH:MM:SS.mmm)
 * that is not part of a longer run of digits.
 */
export const TIMESTAMP_REGEX = /(?<!\d)(\d{1,2}):(\d{2}):(\d{2})\.(\d{3})(?!\d)/g;

/** Leading numeric prefix on log filenames, e.g. "01 - " or "02-". */
export const COMPONENT_PREFIX_REGEX = /^\d+(?:\s*-\s*|\s+)/;

/** Log file extension stripped from component names. */
export const LOG_EXTENSION_REGEX = /\.log$/i;

/** Fields that can be projected in query output. */
export const OUTPUT_FIELDS = ['id', 'ts', 'timestamp', 'component', 'message'] as const;

/** Default output projection. */
export const DEFAULT_OUTPUT_FIELDS = ['timestamp', 'component', 'message'] as const;

/** Output projection used with --withtime. */
export const WITH_TIME_OUTPUT_FIELDS = ['timestamp', 'ts', 'component', 'message'] as const;

/** Separator placed between projected values. */
export const OUTPUT_SEPARATOR = ' | ';
