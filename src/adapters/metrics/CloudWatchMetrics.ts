/**
 * AWS CloudWatch Metrics Adapter
 *
 * Buffers custom metrics and sends them with PutMetricData.
 * CloudWatch accepts at most 20 data points per request, so flushes are chunked.
 *
 * Required IAM permission: cloudwatch:PutMetricData
 */

import {
  CloudWatchClient,
  PutMetricDataCommand,
  MetricDatum,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';
import { logger } from '@/adapters/logging/LoggerFactory';

const MAX_DATUMS_PER_REQUEST = 20;

export interface CloudWatchMetricsOptions {
  region: string;
  /** Background flush period; 0 disables the timer */
  flushIntervalMs?: number;
  client?: Pick<CloudWatchClient, 'send'>;
}

export class CloudWatchMetrics implements IMetrics {
  private buffer: MetricDatum[] = [];
  private flushInterval?: NodeJS.Timeout;
  private client: Pick<CloudWatchClient, 'send'>;

  constructor(
    private readonly namespace: string,
    options: CloudWatchMetricsOptions
  ) {
    this.client = options.client ?? new CloudWatchClient({ region: options.region });

    const intervalMs = options.flushIntervalMs ?? 60_000;
    if (intervalMs > 0) {
      this.flushInterval = setInterval(() => {
        this.flush().catch((err) => {
          logger.error({ err }, 'Failed to flush CloudWatch metrics');
        });
      }, intervalMs);
      // A download run must be able to exit while the timer is pending
      this.flushInterval.unref();
    }
  }

  incrementCounter(name: string, value: number = 1, dimensions?: MetricDimensions): void {
    this.push(name, value, 'Count', dimensions);
  }

  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void {
    this.push(name, value, 'None', dimensions);
  }

  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void {
    this.push(name, value, 'Milliseconds', dimensions);
  }

  recordDistribution(name: string, value: number, dimensions?: MetricDimensions): void {
    this.push(name, value, 'None', dimensions);
  }

  startTimer(name: string, dimensions?: MetricDimensions): () => void {
    const start = Date.now();
    return () => {
      this.recordHistogram(name, Date.now() - start, dimensions);
    };
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const metricsToSend = this.buffer.splice(0);

    try {
      for (let i = 0; i < metricsToSend.length; i += MAX_DATUMS_PER_REQUEST) {
        await this.client.send(
          new PutMetricDataCommand({
            Namespace: this.namespace,
            MetricData: metricsToSend.slice(i, i + MAX_DATUMS_PER_REQUEST),
          })
        );
      }

      logger.debug(
        { count: metricsToSend.length, namespace: this.namespace },
        'Flushed metrics to CloudWatch'
      );
    } catch (error) {
      // Metrics never fail a download run
      logger.error(
        { error, count: metricsToSend.length },
        'Failed to send metrics to CloudWatch'
      );
    }
  }

  async destroy(): Promise<void> {
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = undefined;
    }
    await this.flush();
  }

  private push(
    name: string,
    value: number,
    unit: StandardUnit,
    dimensions?: MetricDimensions
  ): void {
    this.buffer.push({
      MetricName: name,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
      Dimensions: this.formatDimensions(dimensions),
    });
  }

  private formatDimensions(dimensions?: MetricDimensions): Array<{ Name: string; Value: string }> {
    if (!dimensions) return [];

    return Object.entries(dimensions).map(([key, value]) => ({
      Name: key,
      Value: String(value),
    }));
  }
}
