/**
 * Download Rules Configuration
 *
 * Limits and constants for the download pipeline, kept out of the
 * services so they can be tuned in one place.
 */

/**
 * Run limits
 */
export const DOWNLOAD_LIMITS = {
  /** Instruments processed in parallel when nothing else is configured */
  DEFAULT_CONCURRENCY: 1,

  /** Upper bound for --concurrency; providers rate-limit well before this */
  MAX_CONCURRENCY: 16,
} as const;

/**
 * Provider request limits
 */
export const PROVIDER_LIMITS = {
  /** Largest page Polygon returns for aggregates, trades and quotes */
  PAGE_LIMIT: 50_000,

  /** First retry delay; doubled on each further attempt */
  RETRY_BASE_DELAY_MS: 1_000,

  /** HTTP statuses worth retrying */
  RETRYABLE_STATUSES: [429, 500, 502, 503, 504],
} as const;

/**
 * Exact timestamp format accepted for --from-date / --to-date
 */
export const RUN_TIMESTAMP_FORMAT = 'yyyyMMdd-HH:mm:ss';

/**
 * Database Query Configuration (STORE_TYPE=postgres)
 */
export const DB_QUERY_LIMITS = {
  /** Global statement timeout */
  STATEMENT_TIMEOUT_MS: 60_000,

  /** Rows per INSERT statement; 8 parameters per row stays under the 65535 bind limit */
  INSERT_CHUNK_SIZE: 1_000,
} as const;
