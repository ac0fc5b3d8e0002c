import type { StateVector } from '../../entities/state-vector.js';
import type {
  DatasetInfo,
  DatasetSummary,
  EpochWindow,
  NearestStateVector,
} from '../../entities/dataset.js';

// ---------------------------------------------------------------------------
// Inbound port: read side used by the transport layer
// ---------------------------------------------------------------------------

export interface TelemetryQueryPort {
  isLoaded(): boolean;
  listEpochs(window?: EpochWindow): string[];
  getByEpoch(epoch: string): StateVector;
  getNearestToNow(): NearestStateVector;
  getNearestTo(instant: Date): NearestStateVector;
  computeSpeed(record: StateVector): number;
  computeAverageSpeed(): number;
  getDatasetInfo(): DatasetInfo;
  getSummary(): DatasetSummary;
}

// ---------------------------------------------------------------------------
// Inbound port: write side used by the dataset refresher
// ---------------------------------------------------------------------------

export interface TelemetryLoadPort {
  load(records: readonly StateVector[], info?: DatasetInfo): void;
}
