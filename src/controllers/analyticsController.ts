import type { Request, Response } from 'express';
import { z } from 'zod';
import type { AnalyticsService } from '../services/analytics/analyticsService.js';

const runsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional()
});

export function createAnalyticsController(service: AnalyticsService) {
  async function getStats(_req: Request, res: Response) {
    return res.json(await service.getStatistics());
  }

  async function getRuns(req: Request, res: Response) {
    const parsed = runsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    return res.json(await service.getRuns(parsed.data.limit));
  }

  async function getModel(_req: Request, res: Response) {
    return res.json(await service.getModelInfo());
  }

  async function getDashboard(req: Request, res: Response) {
    const parsed = runsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    return res.json(await service.getDashboard(parsed.data.limit));
  }

  function getDiagnostics(_req: Request, res: Response) {
    return res.json(service.getDiagnostics());
  }

  return { getStats, getRuns, getModel, getDashboard, getDiagnostics };
}
