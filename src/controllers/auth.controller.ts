/// <reference path="../types/express.d.ts" />
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthService } from '@/services/auth.service';
import { InvalidTokenError, ValidationError } from '@/errors/auth.errors';

export interface AuthController {
  login: RequestHandler;
  refresh: RequestHandler;
  logout: RequestHandler;
  me: RequestHandler;
}

const readField = (body: unknown, name: string): string | undefined => {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const value = Reflect.get(body, name);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

const requireField = (body: unknown, name: string): string => {
  const value = readField(body, name);
  if (!value) {
    throw new ValidationError(`${name} is required`);
  }
  return value;
};

export const createAuthController = (authService: AuthService): AuthController => {
  const login = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const username = requireField(req.body, 'username');
      const password = requireField(req.body, 'password');
      const loginData = await authService.login(username, password);
      res.status(200).json(loginData);
    } catch (error) {
      next(error);
    }
  };

  const refresh = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const refreshToken = requireField(req.body, 'refreshToken');
      const tokens = await authService.refresh(refreshToken);
      res.status(200).json(tokens);
    } catch (error) {
      next(error);
    }
  };

  const logout = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      if (!req.user) {
        throw new InvalidTokenError('malformed', 'Request is not authenticated');
      }
      await authService.logout(req.user, readField(req.body, 'refreshToken'));
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  };

  const me = (req: Request, res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new InvalidTokenError('malformed', 'Request is not authenticated'));
      return;
    }
    const { subject, roles, expiresAt } = req.user;
    res.status(200).json({ subject, roles, expiresAt });
  };

  return { login, refresh, logout, me };
};
