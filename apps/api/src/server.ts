import 'dotenv/config';
import { TelemetryStore } from '@iss-tracker/domain';
import { NasaOemFeedAdapter, WallClock } from '@iss-tracker/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { loadConfig } from './config/env.js';
import { DatasetRefresher } from './services/refresh/dataset-refresher.js';

async function main() {
  const config = loadConfig();

  const store = new TelemetryStore(new WallClock());
  const feed = new NasaOemFeedAdapter({
    url: config.OEM_FEED_URL,
    timeoutMs: config.FEED_TIMEOUT_MS,
    maxRetries: config.FEED_MAX_RETRIES,
    retryDelayMs: config.FEED_RETRY_DELAY_MS,
  });
  const refresher = new DatasetRefresher(feed, store, config.REFRESH_INTERVAL_MS);

  // Non-fatal: the API answers 503 until a later refresh succeeds
  try {
    await refresher.refreshNow();
  } catch (err) {
    console.warn(
      '[server] initial dataset load failed, serving 503 until the next refresh:',
      err instanceof Error ? err.message : err,
    );
  }
  refresher.start();

  const app = buildApp({
    store,
    refresher,
    corsOrigin: config.CORS_ORIGIN,
    logRequests: config.LOG_REQUESTS,
  });
  const httpServer = buildHttpServer(app);

  httpServer.listen(config.PORT, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.PORT}`);
  });

  const shutdown = () => {
    console.log('[server] shutting down...');
    refresher.stop();
    httpServer.close(() => process.exit(0));
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
