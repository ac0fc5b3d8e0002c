import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { TelemetryError } from '@iss-tracker/domain';
import type { TelemetryErrorCode } from '@iss-tracker/domain';
import { FeedFetchError, OemParseError } from '@iss-tracker/adapters';
import type { AdapterErrorCode } from '@iss-tracker/adapters';

const STATUS_BY_CODE: Record<TelemetryErrorCode | AdapterErrorCode, number> = {
  NOT_LOADED: 503,
  EPOCH_NOT_FOUND: 404,
  EMPTY_DATASET: 422,
  DUPLICATE_EPOCH: 422,
  INVALID_VECTOR: 422,
  INVALID_EPOCH: 422,
  INVALID_WINDOW: 400,
  OEM_PARSE: 502,
  FEED_FETCH: 502,
};

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof TelemetryError || err instanceof OemParseError || err instanceof FeedFetchError) {
    res.status(STATUS_BY_CODE[err.code]).json({ error: err.code.toLowerCase(), message: err.message });
    return;
  }
  if (err instanceof Error) {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    res.status(status).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: 'not_found', message: `no route for ${req.method} ${req.path}` });
}
