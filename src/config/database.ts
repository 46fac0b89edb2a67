import { Pool, PoolClient } from 'pg';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { DATABASE_POOL_CONFIG } from '@/config/database.config';
import { DB_QUERY_LIMITS } from '@/config/downloadRules';

/**
 * PostgreSQL connection pool
 * Created on first use so that disk-only runs never touch the database.
 */
let pool: Pool | null = null;

function getPool(): Pool {
  if (pool) return pool;

  pool = new Pool({
    host: env.DB_HOST,
    port: env.DB_PORT,
    database: env.DB_NAME,
    user: env.DB_USER,
    password: env.DB_PASSWORD,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
    min: DATABASE_POOL_CONFIG.min,
    max: DATABASE_POOL_CONFIG.max,
    idleTimeoutMillis: DATABASE_POOL_CONFIG.idleTimeoutMillis,
    connectionTimeoutMillis: DATABASE_POOL_CONFIG.connectionTimeoutMillis,
    // Applied by the server to every statement on every connection
    statement_timeout: DB_QUERY_LIMITS.STATEMENT_TIMEOUT_MS,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected error on idle PostgreSQL client');
  });

  return pool;
}

/**
 * Execute a function within a database transaction
 * Automatically handles commit/rollback
 *
 * @param callback - Function to execute within transaction
 * @returns Result of the callback function
 */
export async function transaction<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await getPool().connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error({ error }, 'Transaction rolled back');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Close all connections in the pool (no-op when it was never opened)
 */
export async function closePool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
  logger.info('Database pool closed');
}
