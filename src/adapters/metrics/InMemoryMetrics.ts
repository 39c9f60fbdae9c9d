/**
 * In-process Prometheus registry
 *
 * Counters and latency summaries live in memory and are scraped from
 * GET /api/metrics. Suitable for a single instance; every replica exposes
 * its own series.
 */

import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

// Keep only the most recent observations per series to bound memory
const MAX_OBSERVATIONS = 1000;
const QUANTILES = [0.5, 0.95, 0.99] as const;

function formatLabels(dimensions: MetricDimensions): string {
  return Object.keys(dimensions)
    .sort()
    .map((key) => `${key}="${String(dimensions[key]).replace(/"/g, '\\"')}"`)
    .join(',');
}

function withLabels(name: string, labels: string, extra?: string): string {
  const all = [labels, extra].filter((part): part is string => Boolean(part)).join(',');
  return all ? `${name}{${all}}` : name;
}

export class InMemoryMetrics implements IMetrics {
  private readonly counters = new Map<string, Map<string, number>>();
  private readonly summaries = new Map<string, Map<string, number[]>>();

  incrementCounter(name: string, value: number = 1, dimensions: MetricDimensions = {}): void {
    const series = this.counters.get(name) ?? new Map<string, number>();
    const labels = formatLabels(dimensions);
    series.set(labels, (series.get(labels) ?? 0) + value);
    this.counters.set(name, series);
  }

  recordHistogram(name: string, value: number, dimensions: MetricDimensions = {}): void {
    const series = this.summaries.get(name) ?? new Map<string, number[]>();
    const labels = formatLabels(dimensions);
    const observations = series.get(labels) ?? [];
    observations.push(value);
    if (observations.length > MAX_OBSERVATIONS) {
      observations.shift();
    }
    series.set(labels, observations);
    this.summaries.set(name, series);
  }

  startTimer(name: string, dimensions: MetricDimensions = {}): () => void {
    const start = process.hrtime.bigint();
    return () => {
      const seconds = Number(process.hrtime.bigint() - start) / 1e9;
      this.recordHistogram(name, seconds, dimensions);
    };
  }

  toPrometheus(): string[] {
    const lines: string[] = [];

    for (const [name, series] of this.counters) {
      lines.push(`# TYPE ${name} counter`);
      for (const [labels, value] of series) {
        lines.push(`${withLabels(name, labels)} ${value}`);
      }
      lines.push('');
    }

    for (const [name, series] of this.summaries) {
      lines.push(`# TYPE ${name} summary`);
      for (const [labels, observations] of series) {
        if (observations.length === 0) continue;

        const sorted = [...observations].sort((a, b) => a - b);
        const count = sorted.length;
        const sum = sorted.reduce((total, value) => total + value, 0);

        for (const quantile of QUANTILES) {
          const value = sorted[Math.min(count - 1, Math.floor(count * quantile))] ?? 0;
          lines.push(`${withLabels(name, labels, `quantile="${quantile}"`)} ${value.toFixed(4)}`);
        }
        lines.push(`${withLabels(`${name}_sum`, labels)} ${sum.toFixed(4)}`);
        lines.push(`${withLabels(`${name}_count`, labels)} ${count}`);
      }
      lines.push('');
    }

    return lines;
  }

  /**
   * Drop every series (tests)
   */
  reset(): void {
    this.counters.clear();
    this.summaries.clear();
  }
}
