import { formatOrdinalEpoch } from '@iss-tracker/domain';
import type {
  TelemetryLoadPort,
  TelemetryQueryPort,
  TrajectorySourcePort,
} from '@iss-tracker/domain';

export interface RefreshResult {
  count: number;
  loadedAt: Date;
}

export interface RefreshStatus {
  lastRefreshAt: Date | null;
  lastRefreshError: string | null;
}

type RefreshTarget = TelemetryLoadPort & Pick<TelemetryQueryPort, 'getSummary'>;

/**
 * Pulls the trajectory dataset from its source and installs it in the store.
 * Only one refresh runs at a time; a refresh requested while one is in flight
 * joins it. A failed refresh leaves the previous dataset in place.
 */
export class DatasetRefresher {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<RefreshResult> | null = null;
  private lastRefreshAt: Date | null = null;
  private lastRefreshError: string | null = null;

  constructor(
    private readonly source: TrajectorySourcePort,
    private readonly store: RefreshTarget,
    private readonly intervalMs: number,
  ) {}

  refreshNow(): Promise<RefreshResult> {
    if (!this.inFlight) {
      this.inFlight = this.run().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Schedule periodic refresh. No-op when the interval is 0 or already started. */
  start(): void {
    if (this.intervalMs <= 0 || this.timer) return;
    this.timer = setInterval(() => {
      this.refreshNow().catch((err) => {
        console.warn(
          '[refresher] scheduled refresh failed (non-fatal)',
          err instanceof Error ? err.message : err,
        );
      });
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  status(): RefreshStatus {
    return { lastRefreshAt: this.lastRefreshAt, lastRefreshError: this.lastRefreshError };
  }

  private async run(): Promise<RefreshResult> {
    try {
      const dataset = await this.source.fetchDataset();
      this.store.load(dataset.stateVectors, dataset.info);
      const { count, loadedAt, firstEpoch, lastEpoch } = this.store.getSummary();
      this.lastRefreshAt = loadedAt;
      this.lastRefreshError = null;
      console.log(
        `[refresher] loaded ${count} state vectors (${firstEpoch} .. ${lastEpoch}) from ${this.source.description} at ${formatOrdinalEpoch(loadedAt.getTime())}`,
      );
      return { count, loadedAt };
    } catch (err) {
      this.lastRefreshError = err instanceof Error ? err.message : String(err);
      throw err;
    }
  }
}
