import type { StateVector } from './state-vector.js';

/** Ancillary sections of an OEM document. */
export interface DatasetInfo {
  readonly header: Readonly<Record<string, string>>;
  readonly metadata: Readonly<Record<string, string>>;
  readonly comments: readonly string[];
}

/** Output of a trajectory loader, ready for TelemetryStore.load. */
export interface TrajectoryDataset {
  readonly info: DatasetInfo;
  readonly stateVectors: StateVector[];
}

export interface DatasetSummary {
  count: number;
  firstEpoch: string;
  lastEpoch: string;
  loadedAt: Date;
  averageSpeedKmS: number;
}

export interface NearestStateVector {
  record: StateVector;
  /** True when the query instant lies outside the dataset's epoch range */
  isExtrapolated: boolean;
}

export interface EpochWindow {
  offset?: number;
  limit?: number;
}

export function emptyDatasetInfo(): DatasetInfo {
  return { header: {}, metadata: {}, comments: [] };
}
