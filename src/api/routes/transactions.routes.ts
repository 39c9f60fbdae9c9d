import { Router } from 'express';
import * as transactionsController from '@/controllers/transactions.controller';
import { ledgerMutationRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

/**
 * POST /api/v1/transactions
 * Record a transaction (stricter rate limit on every ledger mutation)
 */
router.post('/', ledgerMutationRateLimiter, transactionsController.createTransaction);

/**
 * GET /api/v1/transactions?limit=&cursor=&portfolioId=&walletId=&instrumentId=&type=
 */
router.get('/', transactionsController.listTransactions);

router.get('/:transactionId', transactionsController.getTransaction);

router.put('/:transactionId', ledgerMutationRateLimiter, transactionsController.updateTransaction);

router.delete('/:transactionId', ledgerMutationRateLimiter, transactionsController.deleteTransaction);

/**
 * POST /api/v1/transactions/:transactionId/execute
 * Pending order → executed trade
 */
router.post(
  '/:transactionId/execute',
  ledgerMutationRateLimiter,
  transactionsController.executeTransaction
);

export default router;
