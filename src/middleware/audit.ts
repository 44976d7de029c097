import type { NextFunction, Request, Response } from 'express';
import { buildRequestLogContext, logger } from '../utils/logger.js';
import { recordDiagnostic } from '../observability/errorTracker.js';

export function auditLogger(req: Request, res: Response, next: NextFunction) {
  const startedAt = Date.now();
  res.on('finish', () => {
    const route = `${req.method} ${req.baseUrl}${req.route?.path ?? req.path}`.replace(/\/+/g, '/');
    if (res.statusCode >= 400) {
      const normalized: unknown = res.locals.normalizedError;
      const error = typeof normalized === 'object' && normalized !== null ? normalized : {};
      recordDiagnostic({
        stage: 'api',
        source: route,
        code: 'code' in error && typeof error.code === 'string' ? error.code : 'ERROR',
        message: 'message' in error && typeof error.message === 'string' ? error.message : 'Request failed',
        request_id: req.requestId ?? null
      });
    }
    logger.info('request.completed', {
      ...buildRequestLogContext(req),
      status: res.statusCode,
      duration_ms: Date.now() - startedAt
    });
  });

  return next();
}
