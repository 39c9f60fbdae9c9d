import { AppError } from './AppError';

/**
 * Business Rule Error (422 Unprocessable Entity)
 * The request is well formed but the ledger refuses it,
 * e.g. executing a transaction that is not a pending order.
 */
export class BusinessRuleError extends AppError {
  constructor(message: string) {
    super(message, 422);
    Object.setPrototypeOf(this, BusinessRuleError.prototype);
  }
}
