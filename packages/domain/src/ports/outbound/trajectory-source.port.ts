import type { TrajectoryDataset } from '../../entities/dataset.js';

// ---------------------------------------------------------------------------
// Outbound port: wherever the OEM dataset comes from (NASA feed, file, fixture)
// ---------------------------------------------------------------------------

export interface TrajectorySourcePort {
  /** Human-readable origin, used in logs */
  readonly description: string;
  fetchDataset(): Promise<TrajectoryDataset>;
}
