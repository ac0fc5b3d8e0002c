import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { altitudeKm, inertialToGeodetic } from '@iss-tracker/domain';
import type { TelemetryQueryPort } from '@iss-tracker/domain';
import { toStateVectorBody } from './epochs.controller.js';

export function createNowRouter(store: TelemetryQueryPort): Router {
  const router = Router();

  /**
   * GET /now - the sample nearest to the current time.
   * `isExtrapolated` is true when now falls outside the dataset range.
   * `radialAltitudeKm` is height above the mean-radius sphere; `location.altitude`
   * is height above the WGS-84 ellipsoid.
   */
  router.get('/', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const { record, isExtrapolated } = store.getNearestToNow();
      res.json({
        ...toStateVectorBody(record),
        isExtrapolated,
        speed: store.computeSpeed(record),
        location: inertialToGeodetic(record.position, record.epochMs),
        radialAltitudeKm: altitudeKm(record.position),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
