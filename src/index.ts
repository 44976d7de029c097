import { env } from './config/env.js';
import { logger } from './utils/logger.js';
import { createApp } from './app.js';
import { createAnalyticsService } from './services/analytics/analyticsService.js';

const analytics = createAnalyticsService({
  logDir: env.LOG_DIR,
  recentRunsLimit: env.RECENT_RUNS_LIMIT,
  maxTrainingRows: env.MAX_TRAINING_ROWS
});

const app = createApp({ analytics });

const server = app.listen(Number(env.PORT), () => {
  logger.info('Server started', { port: env.PORT, logDir: env.LOG_DIR });
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    logger.info('Shutting down', { signal });
    server.close(() => process.exit(0));
  });
}
