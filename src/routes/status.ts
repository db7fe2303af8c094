import { Router, type Request, type Response } from 'express';
import type { LoopStatus } from '../services/acquisition/detection-loop.js';

export interface StatusSource {
  getStatus(): LoopStatus;
}

/**
 * GET /api/status: detection loop state and counters.
 */
export function statusRouter(source: StatusSource): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const status = source.getStatus();
    res.json({
      ...status,
      lastCycleAt: status.lastCycleAt?.toISOString() ?? null,
    });
  });

  return router;
}
