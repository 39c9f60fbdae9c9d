/**
 * Rate Limiting Middleware (express-rate-limit)
 *
 * - Global: all endpoints except /health
 * - Ledger mutations: stricter limit on create/update/delete/execute
 *
 * The default in-memory store counts per instance; multi-instance deployments
 * need a shared store.
 */

import rateLimit from 'express-rate-limit';
import { Request } from 'express';
import { RATE_LIMITS } from '@/config/businessRules';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Client IP, first X-Forwarded-For hop when behind the gateway
 */
export function getClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (forwarded) {
    const ips = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    const clientIp = ips?.split(',')[0]?.trim();
    if (clientIp) return clientIp;
  }

  if (req.ip) return req.ip;
  if (req.socket?.remoteAddress) return req.socket.remoteAddress;
  return 'unknown';
}

export const globalRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.GLOBAL.WINDOW_MS,
  limit: RATE_LIMITS.GLOBAL.MAX_REQUESTS,
  message: {
    success: false,
    error: {
      message: `Too many requests. Please try again later. Limit: ${RATE_LIMITS.GLOBAL.MAX_REQUESTS} requests per minute.`,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  skip: (req) => req.path === '/api/health',
});

export const ledgerMutationRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.LEDGER_MUTATIONS.WINDOW_MS,
  limit: RATE_LIMITS.LEDGER_MUTATIONS.MAX_REQUESTS,
  message: {
    success: false,
    error: {
      message: `Too many ledger changes. Please slow down. Limit: ${RATE_LIMITS.LEDGER_MUTATIONS.MAX_REQUESTS} per minute.`,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  handler: (req, res, _next, options) => {
    logger.warn(
      {
        type: 'RATE_LIMIT_EXCEEDED',
        endpoint: 'transactions',
        ip: getClientIp(req),
        limit: options.limit,
      },
      'Rate limit exceeded'
    );
    res.status(options.statusCode).json(options.message);
  },
});
