import { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '@/errors';

/**
 * 404 for unmatched routes, answered by the global error handler
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.originalUrl} not found`));
}
