import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../errors/AppError.js';
import { buildRequestLogContext, logStructuredError, logger } from '../utils/logger.js';

export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(AppError.notFound(`Route ${req.method} ${req.path}`));
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error('App error', { message: err.message, code: err.code, details: err.details });
    }

    return res.status(err.statusCode).json({
      error: {
        code: err.code ?? 'APP_ERROR',
        message: err.message,
        details: err.details
      }
    });
  }

  logStructuredError({
    ...buildRequestLogContext(req),
    status: 500,
    error: err instanceof Error ? err.message : 'Unknown error'
  });
  return res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
}
