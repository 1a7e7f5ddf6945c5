import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { errorHandler } from '@/middleware/errorHandler';
import { createAuthRouter } from '@/routes/auth.routes';
import { AuthContext } from '@/core/context';

export const createApp = (context: AuthContext): Express => {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '10kb' }));
  app.use(helmet());
  app.use(cors({ origin: context.config.ALLOWED_ORIGINS.length > 0 ? context.config.ALLOWED_ORIGINS : false }));

  // Routes
  app.use('/auth', createAuthRouter(context));

  // Health check
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date(context.clock()).toISOString(),
    });
  });

  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` },
    });
  });

  // Error Handler
  app.use(errorHandler);

  return app;
};
