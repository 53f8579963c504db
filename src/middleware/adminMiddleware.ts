import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { IdentityResolver } from '../services/identity/identityResolver.js';

/** Rejects the request with 403 unless the real session user is the administrator. */
export const requireAdmin =
  (identity: IdentityResolver): RequestHandler =>
  (_req: Request, _res: Response, next: NextFunction): void => {
    identity
      .requireAdmin()
      .then(() => next())
      .catch(next);
  };
