/// <reference path="../types/express.d.ts" />
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AUTH_CONFIG } from '@/config/constants';
import { ForbiddenError, InvalidTokenError } from '@/errors/auth.errors';
import { AuthService } from '@/services/auth.service';

export const extractBearerToken = (req: Request): string | undefined => {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith(AUTH_CONFIG.BEARER_PREFIX)) {
    return undefined;
  }
  const token = authHeader.slice(AUTH_CONFIG.BEARER_PREFIX.length).trim();
  return token.length > 0 ? token : undefined;
};

/**
 * Verifies the bearer access token and attaches the caller to `req.user`.
 * Every rejection is forwarded as an InvalidTokenError so clients see one 401.
 */
export const createAuthenticate = (authService: AuthService): RequestHandler =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const token = extractBearerToken(req);
    if (!token) {
      next(new InvalidTokenError('malformed', 'No bearer token provided'));
      return;
    }

    try {
      req.user = await authService.validateSession(token);
      next();
    } catch (error) {
      next(error);
    }
  };

/**
 * Allows the request through when the caller holds at least one of `roles`.
 */
export const requireRole = (...roles: string[]): RequestHandler =>
  (req: Request, res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new InvalidTokenError('malformed', 'Request is not authenticated'));
      return;
    }
    const granted = req.user.roles.some(role => roles.includes(role));
    if (!granted) {
      next(new ForbiddenError(`Requires one of the roles: ${roles.join(', ')}`));
      return;
    }
    next();
  };
