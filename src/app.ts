import express from 'express';
import cors from 'cors';
import { env } from './config/env.js';
import { createV1Routes } from './routes/v1/index.js';
import { apiRateLimit } from './middleware/rateLimit.js';
import { auditLogger } from './middleware/audit.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestContext } from './middleware/requestContext.js';
import { responseWrapper } from './middleware/responseWrapper.js';
import { createRouteMetricMiddleware } from './observability/metrics.js';
import { createTraceMiddleware } from './observability/telemetry.js';
import type { AnalyticsService } from './services/analytics/analyticsService.js';

export interface AppDependencies {
  analytics: AnalyticsService;
}

export function createApp({ analytics }: AppDependencies) {
  const app = express();

  app.use(requestContext);
  app.use(responseWrapper);

  app.use(cors({
    origin: env.FRONTEND_URL ?? 'http://localhost:5173',
    credentials: true
  }));

  app.use(createTraceMiddleware());
  app.use(apiRateLimit);
  app.use(auditLogger);
  app.use(createRouteMetricMiddleware());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/v1', createV1Routes(analytics));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
