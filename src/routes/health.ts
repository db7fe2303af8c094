import { Router } from 'express';

/**
 * GET /healthz. `check` probes a backing service (the database, when one is
 * used); a rejection answers 503.
 */
export function healthRouter(check?: () => Promise<unknown>): Router {
  const router = Router();

  router.get('/healthz', async (_req, res) => {
    try {
      await check?.();
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    } catch {
      res.status(503).json({ status: 'error' });
    }
  });

  return router;
}
