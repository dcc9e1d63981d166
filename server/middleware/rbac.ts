import { Request, Response, NextFunction } from 'express';
import { AuthenticationError, ForbiddenError } from '../errors';

export function requireAdmin(req: Request, _res: Response, next: NextFunction) {
  if (!req.user) {
    return next(new AuthenticationError());
  }

  if (!req.user.isAdmin) {
    return next(new ForbiddenError('Forbidden - Admin access required'));
  }

  return next();
}
