import { Router } from 'express';
import transactionsRoutes from './transactions.routes';
import instrumentsRoutes from './instruments.routes';
import { ownerRoutes } from './owners.routes';
import { portfoliosController } from '@/controllers/portfolios.controller';
import { walletsController } from '@/controllers/wallets.controller';
import { getMetrics } from '@/api/controllers/metrics.controller';
import { authenticate } from '@/middlewares/authenticate';

const router = Router();

/**
 * API Routes
 * Base path: /api
 *
 * Versioning Strategy: /api/v1/*
 * Health and metrics stay unversioned (infrastructure, not API)
 */

router.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    service: 'position-ledger-api',
    version: 'v1',
  });
});

// Prometheus text format
router.get('/metrics', getMetrics);

const v1Router = Router();

// The gateway authenticates callers and forwards their id in X-User-Id
v1Router.use(authenticate);

v1Router.use('/transactions', transactionsRoutes);
v1Router.use('/instruments', instrumentsRoutes);
v1Router.use('/portfolios', ownerRoutes(portfoliosController));
v1Router.use('/wallets', ownerRoutes(walletsController));

router.use('/v1', v1Router);

export default router;
