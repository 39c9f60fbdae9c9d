/**
 * Metrics Interface
 *
 * Abstraction for HTTP and ledger metrics. Adapters decide where values go;
 * the factory picks one from METRICS_TYPE.
 */

/**
 * Label set attached to a sample
 */
export type MetricDimensions = Record<string, string | number | boolean>;

export interface IMetrics {
  /**
   * Increment a counter
   *
   * @example
   * metrics.incrementCounter('ledger_operations_total', 1, { operation: 'create', type: 'Buy' });
   */
  incrementCounter(name: string, value?: number, dimensions?: MetricDimensions): void;

  /**
   * Record one observation of a summary (durations in seconds)
   */
  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Start a timer; calling the returned function records the elapsed seconds
   */
  startTimer(name: string, dimensions?: MetricDimensions): () => void;

  /**
   * Render every series in Prometheus text exposition format
   */
  toPrometheus(): string[];
}

export interface IMetricsFactory {
  createMetrics(): IMetrics;
}
