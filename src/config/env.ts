import { cleanEnv, str, num, bool } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety. Values here are the
 * baseline; a --config file passed to the CLI overrides the download
 * settings (see config/settings.ts).
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Runtime
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'production',
    desc: 'Runtime environment (affects log formatting)',
  }),

  // ==========================================
  // Logging & Metrics
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs in development',
  }),
  LOGGER_TYPE: str({
    choices: ['console', 'json'],
    default: 'console',
    desc: 'Logger adapter',
  }),
  METRICS_TYPE: str({
    choices: ['noop', 'cloudwatch'],
    default: 'noop',
    desc: 'Metrics adapter',
  }),

  // ==========================================
  // Download
  // ==========================================
  DATA_FOLDER: str({
    default: './data',
    desc: 'Root folder of the partitioned data store',
  }),
  RESULTS_DESTINATION_FOLDER: str({
    default: '',
    desc: 'Folder receiving the run report (empty = no report files)',
  }),
  STORE_TYPE: str({
    choices: ['disk', 'postgres'],
    default: 'disk',
    desc: 'Store writer used for downloaded batches',
  }),
  DOWNLOAD_CONCURRENCY: num({
    default: 1,
    desc: 'Instruments processed in parallel',
  }),

  // ==========================================
  // Polygon
  // ==========================================
  POLYGON_API_KEY: str({
    default: '',
    desc: 'Polygon API key (REQUIRED to download)',
  }),
  POLYGON_BASE_URL: str({
    default: 'https://api.polygon.io',
    desc: 'Polygon REST base URL',
  }),
  POLYGON_TIMEOUT_MS: num({
    default: 30_000,
    desc: 'Timeout for one Polygon HTTP request',
  }),
  POLYGON_MAX_RETRIES: num({
    default: 3,
    desc: 'Retries for rate-limited or failed Polygon requests',
  }),

  // ==========================================
  // Database (STORE_TYPE=postgres)
  // ==========================================
  DB_HOST: str({ default: 'localhost', desc: 'PostgreSQL host' }),
  DB_PORT: num({ default: 5432, desc: 'PostgreSQL port' }),
  DB_NAME: str({ default: 'market_history', desc: 'PostgreSQL database name' }),
  DB_USER: str({ default: 'postgres', desc: 'PostgreSQL username' }),
  DB_PASSWORD: str({ default: 'postgres', desc: 'PostgreSQL password' }),
  DB_SSL: bool({ default: false, desc: 'Use SSL for the PostgreSQL connection' }),
  DB_MAX_CONNECTIONS: num({ default: 10, desc: 'Maximum database pool size' }),

  // ==========================================
  // AWS CloudWatch (METRICS_TYPE=cloudwatch)
  // ==========================================
  AWS_REGION: str({ default: 'us-east-1', desc: 'AWS region for CloudWatch' }),
  CLOUDWATCH_METRICS_NAMESPACE: str({
    default: 'HistoryToolbox',
    desc: 'CloudWatch Metrics namespace',
  }),
});

export type Env = typeof env;
