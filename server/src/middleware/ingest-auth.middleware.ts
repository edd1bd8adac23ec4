/**
 * Ingest Auth Middleware
 * Only the trusted backend may report changes. With a token configured, callers must
 * send `Authorization: Bearer <token>`; without one the route is open (local deployments).
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { safeEqual } from '../utils/security.utils.js';
import { AppError } from './error.middleware.js';

export function ingestAuthMiddleware(token: string | undefined): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!token) {
      next();
      return;
    }

    const header = req.headers.authorization ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);
    const presented = match?.[1];

    if (!presented || !safeEqual(presented, token)) {
      next(new AppError('Missing or invalid ingest token', 401, 'UNAUTHORIZED', undefined, true));
      return;
    }

    next();
  };
}
