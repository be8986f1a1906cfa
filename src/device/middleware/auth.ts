import crypto from 'crypto';
import { NextFunction, Request, Response } from 'express';
import { AuthError } from '../../protocol/errors';

export interface AuthOptions {
  enabled: boolean;
  token: string;
  /** Exact GET paths served without a token. */
  publicPaths?: string[];
}

/**
 * Checks an Authorization header against `Bearer <token>`. Shared by the
 * HTTP pipeline and the WebSocket upgrade.
 */
export function isAuthorized(header: string | undefined, options: AuthOptions): boolean {
  if (!options.enabled) return true;
  if (!header) return false;

  const expected = Buffer.from(`Bearer ${options.token}`);
  const actual = Buffer.from(header);
  if (actual.length !== expected.length) return false;

  return crypto.timingSafeEqual(actual, expected);
}

export function createAuthMiddleware(options: AuthOptions) {
  const publicPaths = new Set(options.publicPaths ?? []);

  return (req: Request, _res: Response, next: NextFunction): void => {
    if (req.method === 'GET' && publicPaths.has(req.path)) {
      next();
      return;
    }

    if (!isAuthorized(req.headers.authorization, options)) {
      next(new AuthError());
      return;
    }

    next();
  };
}
