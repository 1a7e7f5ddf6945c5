import { Router } from 'express';
import { createAuthController } from '@/controllers/auth.controller';
import { createAuthenticate } from '@/middleware/auth';
import { AuthContext } from '@/core/context';

export const createAuthRouter = (context: AuthContext): Router => {
  const router = Router();
  const controller = createAuthController(context.authService);
  const authenticate = createAuthenticate(context.authService);

  router.post('/login', controller.login);
  router.post('/refresh', controller.refresh);
  router.post('/logout', authenticate, controller.logout);
  router.get('/me', authenticate, controller.me);

  return router;
};
