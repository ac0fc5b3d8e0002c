/**
 * Port Interface Contract Tests
 *
 * Verify that port interfaces define the expected method signatures.
 * A compilation failure here means the port shape changed.
 */

import { describe, it, expect, jest } from '@jest/globals';

import type {
  TelemetryQueryPort,
  TelemetryLoadPort,
} from '../ports/inbound/telemetry-query.port.js';
import type { TrajectorySourcePort } from '../ports/outbound/trajectory-source.port.js';
import type { ClockPort } from '../ports/outbound/clock.port.js';
import type { TrajectoryDataset } from '../entities/dataset.js';
import { TelemetryStore } from '../services/telemetry-store.js';
import { createStateVector } from '../entities/state-vector.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Inbound Ports
// ═══════════════════════════════════════════════════════════════════════════════

describe('TelemetryQueryPort', () => {
  it('is implemented by TelemetryStore', () => {
    const port: TelemetryQueryPort = new TelemetryStore();
    expect(typeof port.listEpochs).toBe('function');
    expect(typeof port.getByEpoch).toBe('function');
    expect(typeof port.getNearestToNow).toBe('function');
    expect(typeof port.getNearestTo).toBe('function');
    expect(typeof port.computeSpeed).toBe('function');
    expect(typeof port.computeAverageSpeed).toBe('function');
    expect(typeof port.getDatasetInfo).toBe('function');
    expect(typeof port.getSummary).toBe('function');
    expect(port.isLoaded()).toBe(false);
  });
});

describe('TelemetryLoadPort', () => {
  it('is implemented by TelemetryStore', () => {
    const port: TelemetryLoadPort = new TelemetryStore();
    expect(typeof port.load).toBe('function');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Outbound Ports
// ═══════════════════════════════════════════════════════════════════════════════

describe('TrajectorySourcePort', () => {
  it('defines description and fetchDataset', async () => {
    const dataset: TrajectoryDataset = {
      info: { header: {}, metadata: { OBJECT_NAME: 'ISS' }, comments: [] },
      stateVectors: [
        createStateVector({
          epoch: '2024-067T12:00:00.000Z',
          position: { x: 1, y: 2, z: 3 },
          velocity: { x: 0, y: 0, z: 0 },
        }),
      ],
    };
    const source: TrajectorySourcePort = {
      description: 'fixture',
      fetchDataset: jest.fn(async () => dataset),
    };

    await expect(source.fetchDataset()).resolves.toBe(dataset);
    expect(source.description).toBe('fixture');
  });
});

describe('ClockPort', () => {
  it('drives the store\'s notion of now', () => {
    const fixed = new Date(Date.UTC(2024, 2, 7, 12, 1));
    const clock: ClockPort = { now: () => fixed };
    const store = new TelemetryStore(clock);
    store.load([
      createStateVector({
        epoch: '2024-067T12:00:00.000Z',
        position: { x: 1, y: 2, z: 3 },
        velocity: { x: 0, y: 0, z: 0 },
      }),
      createStateVector({
        epoch: '2024-067T12:04:00.000Z',
        position: { x: 1, y: 2, z: 3 },
        velocity: { x: 0, y: 0, z: 0 },
      }),
    ]);

    expect(store.getNearestToNow().record.epoch).toBe('2024-067T12:00:00.000Z');
    expect(store.getSummary().loadedAt).toBe(fixed);
  });
});
