/**
 * Database Connection Pool Configuration (STORE_TYPE=postgres)
 *
 * A download run is a short-lived batch job with at most
 * DOWNLOAD_CONCURRENCY writers in flight, so the pool is small and
 * does not keep idle connections warm.
 */

import { env } from './env';

export const DATABASE_POOL_CONFIG = {
  /**
   * No pre-warmed connections: runs that never write to PostgreSQL
   * never open one.
   */
  min: 0,

  /**
   * One connection per concurrent writer is enough; the default of 10
   * leaves headroom over the largest sensible --concurrency.
   */
  max: env.DB_MAX_CONNECTIONS || 10,

  /**
   * Release idle connections quickly so the process can exit as soon
   * as the last batch is written.
   */
  idleTimeoutMillis: 10_000,

  /**
   * Fail the write (and the instrument) rather than hang when the
   * database is unreachable.
   */
  connectionTimeoutMillis: 10_000,
} as const;
