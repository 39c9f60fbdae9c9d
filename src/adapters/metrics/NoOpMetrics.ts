import { IMetrics } from '@/interfaces/IMetrics';

/**
 * No-op Metrics Implementation
 * Used when METRICS_TYPE=noop and by unit tests.
 */
export class NoOpMetrics implements IMetrics {
  incrementCounter(): void {}
  recordHistogram(): void {}
  startTimer(): () => void {
    return () => {};
  }
  toPrometheus(): string[] {
    return [];
  }
}
