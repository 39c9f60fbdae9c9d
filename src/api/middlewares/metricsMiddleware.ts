/**
 * HTTP Metrics Middleware
 *
 * Series recorded on the shared metrics registry:
 * - http_requests_total{method,path,status}
 * - http_request_duration_seconds{method,path}
 */

import { Request, Response, NextFunction } from 'express';
import { metrics } from '@/adapters/metrics/MetricsFactory';

/**
 * Normalize path to avoid cardinality explosion
 * Examples:
 * - /api/v1/portfolios/12/positions/7 -> /api/v1/portfolios/:id/positions/:id
 * - /api/v1/transactions/456 -> /api/v1/transactions/:id
 */
export function normalizePath(path: string): string {
  return path
    .replace(/\/\d+(?=\/|$)/g, '/:id')
    .replace(/\/[a-f0-9-]{36}(?=\/|$)/g, '/:uuid');
}

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const path = normalizePath(req.path || req.url);

  // Skip infrastructure endpoints to avoid noise
  if (path === '/api/metrics' || path === '/api/health') {
    next();
    return;
  }

  const stopTimer = metrics.startTimer('http_request_duration_seconds', {
    method: req.method,
    path,
  });

  res.on('finish', () => {
    stopTimer();
    metrics.incrementCounter('http_requests_total', 1, {
      method: req.method,
      path,
      status: res.statusCode,
    });
  });

  next();
}
