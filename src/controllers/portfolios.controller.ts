import { portfolioService } from '@/config/dependencies';
import { portfolioPayloadSchema } from '@/validators/owner.validator';
import { createOwnerController } from './owners.controller';

/**
 * Portfolios Controller
 * /api/v1/portfolios
 */
export const portfoliosController = createOwnerController(
  portfolioService,
  portfolioPayloadSchema,
  'portfolio'
);
