import { Request, Response, NextFunction } from 'express';
import { transactionService } from '@/config/dependencies';
import {
  listTransactionsQuerySchema,
  toTransactionInput,
  transactionPayloadSchema,
} from '@/validators/transaction.validator';
import { ValidationError } from '@/errors';
import { currentUserId } from '@/middlewares/authenticate';
import { parseIdParam } from '@/utils/params';
import { TransactionInput } from '@/models';

/**
 * Transactions Controller
 * Handles HTTP requests for ledger transactions
 */

function parsePayload(body: unknown): TransactionInput {
  const validationResult = transactionPayloadSchema.safeParse(body);

  if (!validationResult.success) {
    throw new ValidationError('Invalid transaction data', validationResult.error.flatten());
  }

  return toTransactionInput(validationResult.data);
}

/**
 * POST /api/v1/transactions
 * Record a transaction and apply it to the positions it touches
 */
export async function createTransaction(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = currentUserId(res);
    const result = await transactionService.create(userId, parsePayload(req.body));

    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/transactions
 * Newest first, paginated by a (date, id) cursor
 */
export async function listTransactions(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = currentUserId(res);
    const validationResult = listTransactionsQuerySchema.safeParse(req.query);

    if (!validationResult.success) {
      throw new ValidationError('Invalid query parameters', validationResult.error.flatten());
    }

    const { limit, cursor, ...filters } = validationResult.data;
    const page = await transactionService.list(userId, filters, limit, cursor);

    res.json(page);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/transactions/:transactionId
 */
export async function getTransaction(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = currentUserId(res);
    const transactionId = parseIdParam(req.params.transactionId, 'transaction ID');

    res.json(await transactionService.getById(userId, transactionId));
  } catch (error) {
    next(error);
  }
}

/**
 * PUT /api/v1/transactions/:transactionId
 * Replace a transaction; the previous effect is reversed first
 */
export async function updateTransaction(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = currentUserId(res);
    const transactionId = parseIdParam(req.params.transactionId, 'transaction ID');
    const result = await transactionService.update(userId, transactionId, parsePayload(req.body));

    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE /api/v1/transactions/:transactionId
 */
export async function deleteTransaction(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = currentUserId(res);
    const transactionId = parseIdParam(req.params.transactionId, 'transaction ID');

    res.json(await transactionService.delete(userId, transactionId));
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/transactions/:transactionId/execute
 * Execute a pending Buy/Sell order
 */
export async function executeTransaction(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const userId = currentUserId(res);
    const transactionId = parseIdParam(req.params.transactionId, 'transaction ID');

    res.json(await transactionService.executeOrder(userId, transactionId));
  } catch (error) {
    next(error);
  }
}
