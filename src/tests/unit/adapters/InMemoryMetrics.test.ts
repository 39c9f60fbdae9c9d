import { InMemoryMetrics } from '@/adapters/metrics/InMemoryMetrics';
import { MetricsFactory } from '@/adapters/metrics/MetricsFactory';
import { NoOpMetrics } from '@/adapters/metrics/NoOpMetrics';

describe('InMemoryMetrics', () => {
  let metrics: InMemoryMetrics;

  beforeEach(() => {
    metrics = new InMemoryMetrics();
  });

  it('should sum counters per label set with sorted labels', () => {
    metrics.incrementCounter('ledger_operations_total', 1, { type: 'Buy', operation: 'create' });
    metrics.incrementCounter('ledger_operations_total', 2, { operation: 'create', type: 'Buy' });
    metrics.incrementCounter('ledger_operations_total', 1, { operation: 'delete', type: 'Sell' });

    expect(metrics.toPrometheus()).toEqual([
      '# TYPE ledger_operations_total counter',
      'ledger_operations_total{operation="create",type="Buy"} 3',
      'ledger_operations_total{operation="delete",type="Sell"} 1',
      '',
    ]);
  });

  it('should render summaries with quantiles, sum and count', () => {
    for (const value of [0.1, 0.2, 0.3, 0.4]) {
      metrics.recordHistogram('http_request_duration_seconds', value, { method: 'GET' });
    }

    expect(metrics.toPrometheus()).toEqual([
      '# TYPE http_request_duration_seconds summary',
      'http_request_duration_seconds{method="GET",quantile="0.5"} 0.3000',
      'http_request_duration_seconds{method="GET",quantile="0.95"} 0.4000',
      'http_request_duration_seconds{method="GET",quantile="0.99"} 0.4000',
      'http_request_duration_seconds_sum{method="GET"} 1.0000',
      'http_request_duration_seconds_count{method="GET"} 4',
      '',
    ]);
  });

  it('should escape quotes in label values', () => {
    metrics.incrementCounter('errors_total', 1, { message: 'bad "input"' });

    expect(metrics.toPrometheus()[1]).toBe('errors_total{message="bad \\"input\\""} 1');
  });

  it('should record elapsed time when a timer stops', () => {
    const stop = metrics.startTimer('job_seconds');
    stop();

    expect(metrics.toPrometheus()).toContain('job_seconds_count 1');
  });

  it('should forget everything on reset', () => {
    metrics.incrementCounter('ledger_operations_total');
    metrics.reset();

    expect(metrics.toPrometheus()).toEqual([]);
  });
});

describe('MetricsFactory', () => {
  it('should build the backend named by METRICS_TYPE', () => {
    expect(new MetricsFactory('memory').createMetrics()).toBeInstanceOf(InMemoryMetrics);
    expect(new MetricsFactory('noop').createMetrics()).toBeInstanceOf(NoOpMetrics);
    expect(new NoOpMetrics().toPrometheus()).toEqual([]);
  });
});
