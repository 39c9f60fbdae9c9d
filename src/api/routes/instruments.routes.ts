import { Router } from 'express';
import * as instrumentsController from '@/controllers/instruments.controller';

const router = Router();

/**
 * GET /api/v1/instruments
 */
router.get('/', instrumentsController.listUsedInstruments);

/**
 * GET /api/v1/instruments/:instrumentId/distribution
 */
router.get('/:instrumentId/distribution', instrumentsController.getDistribution);

export default router;
