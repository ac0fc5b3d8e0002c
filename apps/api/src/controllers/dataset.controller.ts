import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { TelemetryQueryPort } from '@iss-tracker/domain';

export function createDatasetRouter(store: TelemetryQueryPort): Router {
  const router = Router();

  /** GET /header - OEM header keywords */
  router.get('/header', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(store.getDatasetInfo().header);
    } catch (err) {
      next(err);
    }
  });

  /** GET /metadata - OEM metadata keywords (object, frame, time system, span) */
  router.get('/metadata', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(store.getDatasetInfo().metadata);
    } catch (err) {
      next(err);
    }
  });

  /** GET /comment - OEM comment lines */
  router.get('/comment', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(store.getDatasetInfo().comments);
    } catch (err) {
      next(err);
    }
  });

  /** GET /summary - sample count, epoch range and mean speed */
  router.get('/summary', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = store.getSummary();
      res.json({ ...summary, loadedAt: summary.loadedAt.toISOString() });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
