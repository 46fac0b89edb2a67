/**
 * Metrics Interface
 *
 * Abstraction for run metrics. Enables switching between monitoring
 * backends (CloudWatch, none) without changing the download pipeline.
 */

/**
 * Metric dimensions - tags for metric filtering and grouping
 */
export type MetricDimensions = Record<string, string | number | boolean>;

export interface IMetrics {
  /**
   * Increment a counter metric
   *
   * @example
   * metrics.incrementCounter('download.outcomes', 1, { status: 'Written' });
   */
  incrementCounter(name: string, value?: number, dimensions?: MetricDimensions): void;

  /**
   * Record a gauge metric (point-in-time value)
   *
   * @example
   * metrics.recordGauge('download.instruments_pending', 12);
   */
  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Record a duration in milliseconds
   */
  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Record a value for percentile analysis
   *
   * @example
   * metrics.recordDistribution('download.observations', batch.observations.length);
   */
  recordDistribution(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Start a timer; the returned function records the elapsed time
   */
  startTimer(name: string, dimensions?: MetricDimensions): () => void;

  /**
   * Send buffered metrics to the backend
   */
  flush(): Promise<void>;

  /**
   * Stop background work and flush what is left. Called once before exit.
   */
  destroy(): Promise<void>;
}

/**
 * Metrics Factory Interface
 */
export interface IMetricsFactory {
  /**
   * @param namespace - Optional namespace for metrics (e.g., "HistoryToolbox")
   */
  createMetrics(namespace?: string): IMetrics;
}
