import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { inertialToGeodetic } from '@iss-tracker/domain';
import type { StateVector, TelemetryQueryPort } from '@iss-tracker/domain';

const listQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(0).optional(),
});

export function toStateVectorBody(record: StateVector) {
  return {
    epoch: record.epoch,
    position: { ...record.position },
    velocity: { ...record.velocity },
  };
}

/** Plain-text speed (km/s) of the record at `:epoch`. */
function speedHandler(store: TelemetryQueryPort) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = store.getByEpoch(req.params['epoch']);
      res.type('text/plain').send(String(store.computeSpeed(record)));
    } catch (err) {
      next(err);
    }
  };
}

export function createEpochsRouter(store: TelemetryQueryPort): Router {
  const router = Router();

  /** GET /epochs?offset=&limit= - epoch labels, ascending */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      res.json(store.listEpochs(query));
    } catch (err) {
      next(err);
    }
  });

  /** GET /epochs/:epoch - state vector at exactly that epoch */
  router.get('/:epoch', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(toStateVectorBody(store.getByEpoch(req.params['epoch'])));
    } catch (err) {
      next(err);
    }
  });

  /** GET /epochs/:epoch/speed */
  router.get('/:epoch/speed', speedHandler(store));

  /** GET /epochs/:epoch/location - latitude, longitude, altitude under the ISS */
  router.get('/:epoch/location', (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = store.getByEpoch(req.params['epoch']);
      res.json({ epoch: record.epoch, ...inertialToGeodetic(record.position, record.epochMs) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

/** Singular form kept for clients of the original route: GET /epoch/:epoch/speed */
export function createEpochRouter(store: TelemetryQueryPort): Router {
  const router = Router();
  router.get('/:epoch/speed', speedHandler(store));
  return router;
}
