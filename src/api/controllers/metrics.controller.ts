/**
 * Metrics Controller
 *
 * Exposes HTTP, ledger and process metrics in Prometheus text format.
 * Format: https://prometheus.io/docs/instrumenting/exposition_formats/
 */

import { Request, Response } from 'express';
import { metrics } from '@/adapters/metrics/MetricsFactory';

/**
 * GET /api/metrics
 */
export function getMetrics(_req: Request, res: Response): void {
  const lines: string[] = [...metrics.toPrometheus()];

  lines.push('# HELP process_uptime_seconds Process uptime in seconds');
  lines.push('# TYPE process_uptime_seconds gauge');
  lines.push(`process_uptime_seconds ${process.uptime()}`);
  lines.push('');

  const memUsage = process.memoryUsage();

  lines.push('# HELP process_heap_used_bytes Process heap memory used in bytes');
  lines.push('# TYPE process_heap_used_bytes gauge');
  lines.push(`process_heap_used_bytes ${memUsage.heapUsed}`);
  lines.push('');

  lines.push('# HELP process_rss_bytes Process resident set size in bytes');
  lines.push('# TYPE process_rss_bytes gauge');
  lines.push(`process_rss_bytes ${memUsage.rss}`);
  lines.push('');

  const cpuUsage = process.cpuUsage();

  lines.push('# HELP process_cpu_user_seconds_total Total user CPU time in seconds');
  lines.push('# TYPE process_cpu_user_seconds_total counter');
  lines.push(`process_cpu_user_seconds_total ${cpuUsage.user / 1_000_000}`);
  lines.push('');

  lines.push('# HELP app_info Application information');
  lines.push('# TYPE app_info gauge');
  lines.push(`app_info{version="1.0.0",node_version="${process.version}",env="${process.env.NODE_ENV ?? 'development'}"} 1`);
  lines.push('');

  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(lines.join('\n'));
}
