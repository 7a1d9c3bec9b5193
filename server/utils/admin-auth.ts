/**
 * Admin Auth Middleware
 *
 * Mutating routes require the shared secret in the X-Admin-Password header,
 * compared verbatim.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnauthorizedError } from './errors';
import { sendError } from './http';

export const ADMIN_HEADER = 'x-admin-password';

/**
 * Create middleware that rejects requests without the admin secret
 *
 * @param secret - Expected header value; null rejects every request
 */
export function requireAdmin(secret: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (secret === null || req.get(ADMIN_HEADER) !== secret) {
      sendError(res, 'AUTH', new UnauthorizedError());
      return;
    }
    next();
  };
}
