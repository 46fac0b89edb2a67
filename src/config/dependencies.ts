/**
 * Dependency Container
 * Wires the gateway, store writer and pipeline services for one run
 *
 * All concrete implementations are created here and injected into the
 * BatchDownloadService; nothing else in the toolbox calls a constructor
 * of an adapter directly.
 */

import { env } from '@/config/env';
import { DownloadSettings } from '@/config/settings';
import { ILoggerFactory } from '@/interfaces/ILogger';
import { IMetrics } from '@/interfaces/IMetrics';

// Capability implementations
import { IProviderGateway } from '@/gateways/interfaces';
import { PolygonGateway } from '@/gateways/polygon.gateway';
import { IStoreWriter } from '@/writers/interfaces';
import { LeanDiskWriter } from '@/writers/leanDisk.writer';
import { PostgresStoreWriter } from '@/writers/postgres.writer';

// Service implementations
import { BatchDownloadService } from '@/services/download.service';

// ============================================================================
// CAPABILITIES
// ============================================================================

export function createGateway(
  settings: DownloadSettings,
  loggerFactory: ILoggerFactory
): IProviderGateway {
  return new PolygonGateway({
    apiKey: settings.polygonApiKey,
    baseURL: env.POLYGON_BASE_URL,
    timeoutMs: env.POLYGON_TIMEOUT_MS,
    maxRetries: env.POLYGON_MAX_RETRIES,
    logger: loggerFactory.createLogger('PolygonGateway'),
  });
}

/**
 * STORE_TYPE / store-type selects the writer
 */
export function createStoreWriter(
  settings: DownloadSettings,
  loggerFactory: ILoggerFactory
): IStoreWriter {
  switch (settings.storeType) {
    case 'postgres':
      return new PostgresStoreWriter(loggerFactory.createLogger('PostgresStoreWriter'));

    case 'disk':
    default:
      return new LeanDiskWriter(settings.dataFolder, loggerFactory.createLogger('LeanDiskWriter'));
  }
}

// ============================================================================
// SERVICES
// ============================================================================

/**
 * Batch Download Service
 * Resolver, planner and sequencer use their defaults
 */
export function buildDownloadService(
  settings: DownloadSettings,
  loggerFactory: ILoggerFactory,
  metrics: IMetrics
): BatchDownloadService {
  return new BatchDownloadService(
    createGateway(settings, loggerFactory),
    createStoreWriter(settings, loggerFactory),
    loggerFactory.createLogger('BatchDownloadService'),
    { concurrency: settings.concurrency, metrics }
  );
}
