import { Request, Response, NextFunction } from 'express';
import { AppError, InvalidTokenError } from '@/errors/auth.errors';
import { logger } from '@/utils/logger';

interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
  };
}

const errorBody = (code: string, message: string): ErrorBody => ({
  success: false,
  error: { code, message },
});

// body-parser attaches an HTTP status to malformed or oversized bodies
const clientErrorStatus = (err: unknown): number | undefined => {
  if (typeof err !== 'object' || err === null) {
    return undefined;
  }
  const status = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
};

export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof InvalidTokenError) {
    // The reason stays in the logs; clients cannot tell expired from forged
    logger.debug(`Rejected token on ${req.method} ${req.path}: ${err.reason}`);
    res.status(err.statusCode).json(errorBody(err.code, 'Invalid or expired token'));
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error(`${req.method} ${req.path} failed: ${err.message}`);
      res.status(err.statusCode).json(errorBody(err.code, 'Server Error'));
      return;
    }
    res.status(err.statusCode).json(errorBody(err.code, err.message));
    return;
  }

  const status = clientErrorStatus(err);
  if (status) {
    res.status(status).json(errorBody('BAD_REQUEST', 'Malformed request body'));
    return;
  }

  logger.error(`${req.method} ${req.path} failed:`, err);
  res.status(500).json(errorBody('SERVER_ERROR', 'Server Error'));
};
