#!/usr/bin/env node
import { env } from '@/config/env';
import { closePool } from '@/config/database';
import { LoggerFactory, logger } from '@/adapters/logging/LoggerFactory';
import { MetricsFactory } from '@/adapters/metrics/MetricsFactory';
import { buildDownloadService } from '@/config/dependencies';
import { runToolbox } from '@/program';

/**
 * CLI Entry Point
 * Runs one download and exits with its status code
 */
async function main(): Promise<number> {
  const controller = new AbortController();

  // Instruments already in flight finish; no new one starts
  const cancel = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, 'Cancellation requested, finishing in-flight instruments');
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  const metrics = new MetricsFactory({
    type: env.METRICS_TYPE,
    region: env.AWS_REGION,
  }).createMetrics(env.CLOUDWATCH_METRICS_NAMESPACE);

  try {
    return await runToolbox(process.argv.slice(2), {
      out: (text) => process.stdout.write(`${text}\n`),
      err: (text) => process.stderr.write(`${text}\n`),
      env,
      signal: controller.signal,
      createLoggerFactory: (settings) =>
        new LoggerFactory({
          type: env.LOGGER_TYPE,
          level: settings.debugMode ? 'debug' : env.LOG_LEVEL,
        }),
      buildService: (settings, loggerFactory) =>
        buildDownloadService(settings, loggerFactory, metrics),
    });
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
    await metrics.destroy();
    await closePool();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.fatal({ error }, 'Toolbox crashed');
    process.exitCode = 1;
  });
