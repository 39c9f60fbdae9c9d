import { Router } from 'express';
import { OwnerController } from '@/controllers/owners.controller';

/**
 * CRUD and position routes, mounted at /portfolios and /wallets
 */
export function ownerRoutes(controller: OwnerController): Router {
  const router = Router();

  router.get('/', controller.list);
  router.post('/', controller.create);
  router.get('/:id', controller.get);
  router.put('/:id', controller.update);
  router.delete('/:id', controller.remove);

  /**
   * GET /:id/positions/:instrumentId
   * The position, the transactions behind it and the instrument's distribution
   */
  router.get('/:id/positions/:instrumentId', controller.getPosition);

  // Open an empty position / remove one no transaction builds
  router.post('/:id/positions', controller.addPosition);
  router.delete('/:id/positions/:instrumentId', controller.removePosition);

  return router;
}
