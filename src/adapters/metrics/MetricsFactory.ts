/**
 * Metrics Factory
 *
 * Selection Logic:
 * - METRICS_TYPE=memory or unset → InMemoryMetrics (Prometheus scrape endpoint)
 * - METRICS_TYPE=noop → NoOpMetrics
 */

import { env } from '@/config/env';
import { IMetrics, IMetricsFactory } from '@/interfaces/IMetrics';
import { NoOpMetrics } from './NoOpMetrics';
import { InMemoryMetrics } from './InMemoryMetrics';

export class MetricsFactory implements IMetricsFactory {
  constructor(private readonly metricsType: string = env.METRICS_TYPE) {}

  createMetrics(): IMetrics {
    switch (this.metricsType) {
      case 'noop':
        return new NoOpMetrics();

      case 'memory':
      default:
        return new InMemoryMetrics();
    }
  }
}

/**
 * Default metrics instance for application use
 */
export const metrics = new MetricsFactory().createMetrics();
