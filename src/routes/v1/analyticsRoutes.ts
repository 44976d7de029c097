import { Router, type NextFunction, type Request, type Response } from 'express';
import { createAnalyticsController } from '../../controllers/analyticsController.js';
import type { AnalyticsService } from '../../services/analytics/analyticsService.js';

type AsyncHandler = (req: Request, res: Response) => Promise<unknown> | unknown;

function handle(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res)).catch(next);
  };
}

export function createAnalyticsRoutes(service: AnalyticsService) {
  const controller = createAnalyticsController(service);
  const routes = Router();

  routes.get('/stats', handle(controller.getStats));
  routes.get('/runs', handle(controller.getRuns));
  routes.get('/model', handle(controller.getModel));
  routes.get('/dashboard', handle(controller.getDashboard));
  routes.get('/diagnostics', handle(controller.getDiagnostics));

  return routes;
}
