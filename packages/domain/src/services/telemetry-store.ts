import type { StateVector } from '../entities/state-vector.js';
import { assertFiniteStateVector, computeSpeed } from '../entities/state-vector.js';
import type {
  DatasetInfo,
  DatasetSummary,
  EpochWindow,
  NearestStateVector,
} from '../entities/dataset.js';
import { emptyDatasetInfo } from '../entities/dataset.js';
import { parseEpoch } from '../epoch.js';
import {
  DuplicateEpochError,
  EmptyDatasetError,
  EpochNotFoundError,
  InvalidEpochError,
  InvalidWindowError,
  NotLoadedError,
} from '../errors.js';
import type { ClockPort } from '../ports/outbound/clock.port.js';
import type { TelemetryLoadPort, TelemetryQueryPort } from '../ports/inbound/telemetry-query.port.js';

interface Snapshot {
  readonly records: readonly StateVector[];
  readonly byEpochMs: ReadonlyMap<number, StateVector>;
  readonly info: DatasetInfo;
  readonly loadedAt: Date;
  readonly averageSpeedKmS: number;
}

function isCount(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}

const wallClock: ClockPort = { now: () => new Date() };

/**
 * In-memory telemetry store.
 *
 * Holds one immutable snapshot of the trajectory dataset. `load` builds the
 * next snapshot completely before swapping the reference, so a query sees
 * either the previous dataset or the new one, never a mix. A failed load
 * leaves the previous snapshot installed.
 */
export class TelemetryStore implements TelemetryQueryPort, TelemetryLoadPort {
  private snapshot: Snapshot | null = null;

  constructor(private readonly clock: ClockPort = wallClock) {}

  load(records: readonly StateVector[], info: DatasetInfo = emptyDatasetInfo()): void {
    if (records.length === 0) throw new EmptyDatasetError();

    for (const r of records) {
      if (!Number.isFinite(r.epochMs)) throw new InvalidEpochError(r.epoch);
      assertFiniteStateVector(r.epoch, r.position, r.velocity);
    }

    const sorted = [...records].sort((a, b) => a.epochMs - b.epochMs);
    const byEpochMs = new Map<number, StateVector>();
    let speedSum = 0;
    for (const r of sorted) {
      if (byEpochMs.has(r.epochMs)) throw new DuplicateEpochError(r.epoch);
      byEpochMs.set(r.epochMs, r);
      speedSum += computeSpeed(r);
    }

    this.snapshot = Object.freeze({
      records: Object.freeze(sorted),
      byEpochMs,
      info,
      loadedAt: this.clock.now(),
      averageSpeedKmS: speedSum / sorted.length,
    });
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /** Offset and limit must be non-negative integers. */
  listEpochs(window: EpochWindow = {}): string[] {
    const { records } = this.current();
    const offset = window.offset ?? 0;
    if (!isCount(offset) || (window.limit !== undefined && !isCount(window.limit))) {
      throw new InvalidWindowError(offset, window.limit);
    }
    const end = window.limit === undefined ? records.length : offset + window.limit;
    return records.slice(offset, end).map((r) => r.epoch);
  }

  /** Exact match on the instant the label denotes. Unparseable labels are a miss. */
  getByEpoch(epoch: string): StateVector {
    const { byEpochMs } = this.current();
    const epochMs = parseEpoch(epoch);
    const record = epochMs === null ? undefined : byEpochMs.get(epochMs);
    if (!record) throw new EpochNotFoundError(epoch);
    return record;
  }

  getNearestToNow(): NearestStateVector {
    return this.getNearestTo(this.clock.now());
  }

  /**
   * Binary search for the record closest in time to `instant`.
   * Ties between two neighbours go to the earlier one. Outside the dataset
   * range the boundary record is returned with `isExtrapolated` set.
   */
  getNearestTo(instant: Date): NearestStateVector {
    const { records } = this.current();
    const t = instant.getTime();
    const first = records[0];
    const last = records[records.length - 1];

    if (t <= first.epochMs) return { record: first, isExtrapolated: t < first.epochMs };
    if (t >= last.epochMs) return { record: last, isExtrapolated: t > last.epochMs };

    // lower bound: first index with epochMs >= t, always in [1, n-1] here
    let lo = 1;
    let hi = records.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (records[mid].epochMs < t) lo = mid + 1;
      else hi = mid;
    }

    const next = records[lo];
    const prev = records[lo - 1];
    const record = next.epochMs - t < t - prev.epochMs ? next : prev;
    return { record, isExtrapolated: false };
  }

  computeSpeed(record: StateVector): number {
    return computeSpeed(record);
  }

  computeAverageSpeed(): number {
    return this.current().averageSpeedKmS;
  }

  getDatasetInfo(): DatasetInfo {
    return this.current().info;
  }

  getSummary(): DatasetSummary {
    const { records, loadedAt, averageSpeedKmS } = this.current();
    return {
      count: records.length,
      firstEpoch: records[0].epoch,
      lastEpoch: records[records.length - 1].epoch,
      loadedAt,
      averageSpeedKmS,
    };
  }

  private current(): Snapshot {
    if (!this.snapshot) throw new NotLoadedError();
    return this.snapshot;
  }
}
