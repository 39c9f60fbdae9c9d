import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { env } from '@/config/env';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { globalRateLimiter } from '@/middlewares/rateLimiter';
import { metricsMiddleware } from '@/api/middlewares/metricsMiddleware';
import apiRoutes from '@/api/routes';

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers
 */

const app: Application = express();

// ============================================
// Middleware Configuration
// ============================================

// Exactly one hop: the API gateway that also sets X-User-Id
app.set('trust proxy', 1);

// Security headers
app.use(helmet());

// CORS - Disable in production (API should not be called from browsers)
// In development, allow any origin but without credentials
app.use(
  cors({
    origin: env.NODE_ENV === 'production' ? false : '*',
    credentials: false,
  })
);

// Body parsers with size limits
app.use(express.json({ limit: '10kb' }));
app.use(express.urlencoded({ extended: true, limit: '10kb' }));

// HTTP metrics (all requests except /health and /metrics)
app.use(metricsMiddleware);

// Global rate limiting (all routes except /health)
app.use(globalRateLimiter);

// Request logging (pino-http)
app.use(requestLogger);

// ============================================
// Routes
// ============================================

function isDocument(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Swagger API Documentation
try {
  const openapiPath = join(__dirname, '../docs/openapi.yaml');
  const openapiDocument = yaml.load(readFileSync(openapiPath, 'utf8'));
  if (isDocument(openapiDocument)) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiDocument));
  } else {
    logger.warn({ openapiPath }, 'OpenAPI document is not a mapping');
  }
} catch (error) {
  logger.warn({ error }, 'Could not load OpenAPI documentation');
}

// API routes (mounted at /api)
app.use('/api', apiRoutes);

// Root endpoint
app.get('/', (_req, res) => {
  res.json({
    name: 'Position Ledger API',
    version: '1.0.0',
    description: 'Portfolio and wallet positions driven by a transaction ledger',
    documentation: '/api-docs',
    endpoints: {
      health: '/api/health',
      metrics: '/api/metrics',
      transactions: '/api/v1/transactions',
      execute: '/api/v1/transactions/:id/execute',
      instruments: '/api/v1/instruments',
      distribution: '/api/v1/instruments/:instrumentId/distribution',
      portfolios: '/api/v1/portfolios',
      wallets: '/api/v1/wallets',
      positions: '/api/v1/{portfolios|wallets}/:id/positions',
      position: '/api/v1/{portfolios|wallets}/:id/positions/:instrumentId',
    },
  });
});

// ============================================
// Error Handlers
// ============================================

// 404 handler (must be after all routes)
app.use(notFoundHandler);

// Global error handler (must be last)
app.use(errorHandler);

export default app;
