import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { DatasetRefresher } from '../services/refresh/dataset-refresher.js';

export function createAdminRouter(refresher: DatasetRefresher): Router {
  const router = Router();

  /** POST /admin/refresh - re-fetch the feed and swap in the new dataset */
  router.post('/refresh', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await refresher.refreshNow();
      res.json({ count: result.count, loadedAt: result.loadedAt.toISOString() });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
