import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { Server } from 'http';
import type { TelemetryQueryPort } from '@iss-tracker/domain';

import { createNowRouter } from './controllers/now.controller.js';
import { createEpochsRouter, createEpochRouter } from './controllers/epochs.controller.js';
import { createDatasetRouter } from './controllers/dataset.controller.js';
import { createAdminRouter } from './controllers/admin.controller.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import type { DatasetRefresher } from './services/refresh/dataset-refresher.js';

export interface AppDeps {
  store: TelemetryQueryPort;
  /** Enables POST /admin/refresh and refresh status in /healthz */
  refresher?: DatasetRefresher;
  corsOrigin?: string;
  logRequests?: boolean;
}

export function buildApp(deps: AppDeps): Express {
  const { store, refresher } = deps;
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  if (deps.logRequests ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/now', createNowRouter(store));
  app.use('/epochs', createEpochsRouter(store));
  app.use('/epoch', createEpochRouter(store));
  app.use('/', createDatasetRouter(store));
  if (refresher) app.use('/admin', createAdminRouter(refresher));

  app.get('/healthz', (_req, res) => {
    const status = refresher?.status();
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      dataset: store.isLoaded() ? 'loaded' : 'unavailable',
      lastRefreshAt: status?.lastRefreshAt?.toISOString() ?? null,
      lastRefreshError: status?.lastRefreshError ?? null,
    });
  });

  // ─── Fallthrough / error handler (must be last) ─────────────────────────────
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: Express): Server {
  return createServer(app);
}
