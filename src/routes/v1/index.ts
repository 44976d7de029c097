import { Router } from 'express';
import type { AnalyticsService } from '../../services/analytics/analyticsService.js';
import { createAnalyticsRoutes } from './analyticsRoutes.js';

export function createV1Routes(service: AnalyticsService) {
  const v1Routes = Router();
  v1Routes.use('/', createAnalyticsRoutes(service));
  return v1Routes;
}
