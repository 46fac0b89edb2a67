/**
 * Metrics Factory
 *
 * Selection Logic:
 * - METRICS_TYPE=cloudwatch → CloudWatchMetrics
 * - METRICS_TYPE=noop or unset → NoOpMetrics (default)
 */

import { IMetrics, IMetricsFactory } from '@/interfaces/IMetrics';
import { NoOpMetrics } from './NoOpMetrics';
import { CloudWatchMetrics } from './CloudWatchMetrics';

export interface MetricsFactoryOptions {
  type?: string;
  region?: string;
}

export class MetricsFactory implements IMetricsFactory {
  private readonly type: string;
  private readonly region: string;

  constructor(options: MetricsFactoryOptions = {}) {
    this.type = (options.type || process.env.METRICS_TYPE || 'noop').toLowerCase();
    this.region = options.region || process.env.AWS_REGION || 'us-east-1';
  }

  createMetrics(namespace: string = 'HistoryToolbox'): IMetrics {
    switch (this.type) {
      case 'cloudwatch':
        return new CloudWatchMetrics(namespace, { region: this.region });

      case 'noop':
      default:
        return new NoOpMetrics();
    }
  }
}
