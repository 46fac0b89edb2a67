/**
 * No-Op Metrics Adapter
 *
 * Default when METRICS_TYPE is unset, and the metrics used by tests.
 */

import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

export class NoOpMetrics implements IMetrics {
  incrementCounter(_name: string, _value?: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  recordGauge(_name: string, _value: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  recordHistogram(_name: string, _value: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  recordDistribution(_name: string, _value: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  startTimer(_name: string, _dimensions?: MetricDimensions): () => void {
    return () => {};
  }

  async flush(): Promise<void> {}

  async destroy(): Promise<void> {}
}
