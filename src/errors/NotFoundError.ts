import { AppError } from './AppError';

/**
 * Not Found Error (404)
 * The resource does not exist or belongs to another user
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}
