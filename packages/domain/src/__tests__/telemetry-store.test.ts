/**
 * TelemetryStore Tests
 *
 * Loading, epoch enumeration, exact lookup, nearest-epoch resolution and
 * the Unloaded/Loaded state machine.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import type { ClockPort, DatasetInfo, StateVector, Vector3 } from '../index.js';
import {
  TelemetryStore,
  createStateVector,
  DuplicateEpochError,
  EmptyDatasetError,
  EpochNotFoundError,
  InvalidVectorError,
  InvalidWindowError,
  NotLoadedError,
} from '../index.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const T1 = '2024-067T12:00:00.000Z';
const T2 = '2024-067T12:04:00.000Z';
const T3 = '2024-067T12:08:00.000Z';
const T1_MS = Date.UTC(2024, 2, 7, 12, 0, 0);
const MINUTE = 60_000;

class TestClock implements ClockPort {
  constructor(public current: Date) {}

  now(): Date {
    return this.current;
  }
}

function sv(epoch: string, velocity: Vector3 = { x: 3, y: 4, z: 0 }): StateVector {
  return createStateVector({
    epoch,
    position: { x: -4296.4, y: 3571.2, z: 3780.9 },
    velocity,
  });
}

const INFO: DatasetInfo = {
  header: { CREATION_DATE: '2024-067T10:00:00.000Z', ORIGINATOR: 'JSC' },
  metadata: { OBJECT_NAME: 'ISS', REF_FRAME: 'EME2000' },
  comments: ['Source: test fixture'],
};

let clock: TestClock;
let store: TelemetryStore;
let r1: StateVector;
let r2: StateVector;
let r3: StateVector;

beforeEach(() => {
  clock = new TestClock(new Date(T1_MS));
  store = new TelemetryStore(clock);
  r1 = sv(T1, { x: 3, y: 4, z: 0 });
  r2 = sv(T2, { x: 0, y: 0, z: 7 });
  r3 = sv(T3, { x: 1, y: 2, z: 2 });
});

// ═══════════════════════════════════════════════════════════════════════════════
// State machine
// ═══════════════════════════════════════════════════════════════════════════════

describe('before the first load', () => {
  it('reports not loaded', () => {
    expect(store.isLoaded()).toBe(false);
  });

  it('fails every query with NotLoadedError', () => {
    expect(() => store.listEpochs()).toThrow(NotLoadedError);
    expect(() => store.getByEpoch(T1)).toThrow(NotLoadedError);
    expect(() => store.getNearestToNow()).toThrow(NotLoadedError);
    expect(() => store.getNearestTo(new Date(T1_MS))).toThrow(NotLoadedError);
    expect(() => store.computeAverageSpeed()).toThrow(NotLoadedError);
    expect(() => store.getDatasetInfo()).toThrow(NotLoadedError);
    expect(() => store.getSummary()).toThrow(NotLoadedError);
  });

  it('still computes the speed of a record it is handed', () => {
    expect(store.computeSpeed(r1)).toBe(5);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// load
// ═══════════════════════════════════════════════════════════════════════════════

describe('load', () => {
  it('sorts records by epoch', () => {
    store.load([r3, r1, r2]);
    expect(store.isLoaded()).toBe(true);
    expect(store.listEpochs()).toEqual([T1, T2, T3]);
  });

  it('does not mutate the caller array', () => {
    const input = [r3, r1, r2];
    store.load(input);
    expect(input).toEqual([r3, r1, r2]);
  });

  it('rejects an empty dataset', () => {
    expect(() => store.load([])).toThrow(EmptyDatasetError);
    expect(store.isLoaded()).toBe(false);
  });

  it('rejects two records sharing an epoch', () => {
    expect(() => store.load([r1, r2, sv(T1)])).toThrow(new DuplicateEpochError(T1));
  });

  it('treats two labels for the same instant as duplicates', () => {
    expect(() => store.load([r1, sv('2024-03-07T12:00:00Z')])).toThrow(DuplicateEpochError);
  });

  it('rejects a record with a non-finite component', () => {
    const bad: StateVector = { ...r2, velocity: { x: Number.NaN, y: 0, z: 0 } };
    expect(() => store.load([r1, bad])).toThrow(InvalidVectorError);
  });

  it('keeps the previous dataset when a reload fails', () => {
    store.load([r1, r2], INFO);
    expect(() => store.load([r3, sv(T3)])).toThrow(DuplicateEpochError);
    expect(store.listEpochs()).toEqual([T1, T2]);
    expect(store.getDatasetInfo()).toBe(INFO);
  });

  it('replaces the whole dataset on reload', () => {
    store.load([r1, r2], INFO);
    store.load([r3]);
    expect(store.listEpochs()).toEqual([T3]);
    expect(store.getDatasetInfo()).toEqual({ header: {}, metadata: {}, comments: [] });
    expect(() => store.getByEpoch(T1)).toThrow(EpochNotFoundError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Queries
// ═══════════════════════════════════════════════════════════════════════════════

describe('listEpochs', () => {
  beforeEach(() => store.load([r2, r3, r1]));

  it('returns a window when offset and limit are given', () => {
    expect(store.listEpochs({ offset: 1, limit: 1 })).toEqual([T2]);
    expect(store.listEpochs({ offset: 2 })).toEqual([T3]);
    expect(store.listEpochs({ limit: 2 })).toEqual([T1, T2]);
    expect(store.listEpochs({ offset: 5 })).toEqual([]);
    expect(store.listEpochs({ limit: 0 })).toEqual([]);
  });

  it.each([{ offset: -1 }, { limit: -1 }, { offset: 1.5 }, { offset: 0, limit: Number.NaN }])(
    'rejects the window %p',
    (window) => {
      expect(() => store.listEpochs(window)).toThrow(InvalidWindowError);
    },
  );

  it('names the rejected values in the error', () => {
    expect(() => store.listEpochs({ offset: -1 })).toThrow(
      'invalid epoch window: offset=-1 limit=none',
    );
  });
});

describe('getByEpoch', () => {
  beforeEach(() => store.load([r2, r3, r1]));

  it('returns exactly the loaded record for each epoch', () => {
    for (const r of [r1, r2, r3]) {
      expect(store.getByEpoch(r.epoch)).toBe(r);
    }
  });

  it('matches a calendar-form label for the same instant', () => {
    expect(store.getByEpoch('2024-03-07T12:04:00Z')).toBe(r2);
  });

  it('fails with EpochNotFoundError between samples', () => {
    expect(() => store.getByEpoch('2024-067T12:01:00.000Z')).toThrow(
      new EpochNotFoundError('2024-067T12:01:00.000Z'),
    );
  });

  it('fails with EpochNotFoundError for a malformed label', () => {
    expect(() => store.getByEpoch('not-an-epoch')).toThrow(EpochNotFoundError);
  });
});

describe('getNearestToNow', () => {
  beforeEach(() => store.load([r1, r2, r3]));

  it('returns the exact sample when now equals an epoch', () => {
    clock.current = new Date(T1_MS + 4 * MINUTE);
    expect(store.getNearestToNow()).toEqual({ record: r2, isExtrapolated: false });
  });

  it('returns the first sample, extrapolated, before the dataset starts', () => {
    clock.current = new Date(T1_MS - MINUTE);
    expect(store.getNearestToNow()).toEqual({ record: r1, isExtrapolated: true });
  });

  it('returns the last sample, extrapolated, after the dataset ends', () => {
    clock.current = new Date(T1_MS + 60 * MINUTE);
    expect(store.getNearestToNow()).toEqual({ record: r3, isExtrapolated: true });
  });

  it('is not extrapolated on the boundaries themselves', () => {
    clock.current = new Date(T1_MS);
    expect(store.getNearestToNow()).toEqual({ record: r1, isExtrapolated: false });
    clock.current = new Date(T1_MS + 8 * MINUTE);
    expect(store.getNearestToNow()).toEqual({ record: r3, isExtrapolated: false });
  });

  it('picks the closer neighbour between two samples', () => {
    clock.current = new Date(T1_MS + MINUTE);
    expect(store.getNearestToNow().record).toBe(r1);
    clock.current = new Date(T1_MS + 3 * MINUTE);
    expect(store.getNearestToNow().record).toBe(r2);
    clock.current = new Date(T1_MS + 5 * MINUTE);
    expect(store.getNearestToNow().record).toBe(r2);
    clock.current = new Date(T1_MS + 7 * MINUTE + 59_999);
    expect(store.getNearestToNow().record).toBe(r3);
  });

  it('prefers the earlier sample at the exact midpoint', () => {
    clock.current = new Date(T1_MS + 2 * MINUTE);
    expect(store.getNearestToNow()).toEqual({ record: r1, isExtrapolated: false });
    clock.current = new Date(T1_MS + 6 * MINUTE);
    expect(store.getNearestToNow()).toEqual({ record: r2, isExtrapolated: false });
  });
});

describe('getNearestTo on a dense dataset', () => {
  it('resolves every probe to the closest sample', () => {
    const records = Array.from({ length: 1000 }, (_, i) =>
      sv(new Date(T1_MS + i * 4 * MINUTE).toISOString()),
    );
    store.load(records);

    const probe = T1_MS + 517 * 4 * MINUTE + 90_000;
    expect(store.getNearestTo(new Date(probe)).record).toBe(records[517]);
    const later = T1_MS + 517 * 4 * MINUTE + 150_000;
    expect(store.getNearestTo(new Date(later)).record).toBe(records[518]);
  });
});

describe('dataset info and summary', () => {
  it('exposes the info loaded with the vectors', () => {
    store.load([r1, r2, r3], INFO);
    expect(store.getDatasetInfo()).toBe(INFO);
  });

  it('summarises count, range, load time and average speed', () => {
    store.load([r3, r1, r2], INFO);
    expect(store.computeAverageSpeed()).toBe(5);
    expect(store.getSummary()).toEqual({
      count: 3,
      firstEpoch: T1,
      lastEpoch: T3,
      loadedAt: new Date(T1_MS),
      averageSpeedKmS: 5,
    });
  });
});
