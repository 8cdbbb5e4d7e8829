import type { NextFunction, Request, Response } from 'express';
import type { User } from '../domain/user';
import { unauthenticated } from '../errors';
import { sendError } from '../http/errors';
import type { Logger } from '../logger';
import type { AuthService } from '../services/authService';

declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

export function bearerToken(header: string | undefined): string | undefined {
  const match = header && /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match ? match[1] : undefined;
}

/** Gate for every protected router: resolves the bearer token to `req.user` or answers 401. */
export function requireAuth(auth: AuthService, logger: Logger) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const token = bearerToken(req.headers.authorization);
      if (!token) throw unauthenticated('Not authenticated');
      req.user = await auth.authenticate(token);
      next();
    } catch (e) {
      sendError(res, e, logger);
    }
  };
}

/** The user `requireAuth` attached. */
export function currentUser(req: Request): User {
  if (!req.user) throw unauthenticated('Not authenticated');
  return req.user;
}
