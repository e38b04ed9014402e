import { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '@/errors';

/**
 * 404 handler for unmatched routes
 * Must be registered after all routes and before the error handler
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}
