import { AppError } from './AppError';

/**
 * Conflict Error (409)
 * Duplicate owner name, a position row created by a concurrent request,
 * or deleting an owner that transactions still reference
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}
