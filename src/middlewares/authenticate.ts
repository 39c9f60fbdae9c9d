import { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from '@/errors';

/**
 * Header set by the API gateway after it verified the caller's token
 */
export const USER_ID_HEADER = 'x-user-id';

/**
 * Reads the authenticated user id into res.locals.userId
 */
export function authenticate(req: Request, res: Response, next: NextFunction): void {
  const header = req.header(USER_ID_HEADER);
  const userId = header ? Number(header) : NaN;

  if (!Number.isInteger(userId) || userId <= 0) {
    next(new UnauthorizedError('Missing or invalid X-User-Id header'));
    return;
  }

  res.locals.userId = userId;
  next();
}

/**
 * The user id stored by `authenticate`
 */
export function currentUserId(res: Response): number {
  const userId: unknown = res.locals.userId;
  if (typeof userId !== 'number') {
    throw new UnauthorizedError('Request is not authenticated');
  }
  return userId;
}
