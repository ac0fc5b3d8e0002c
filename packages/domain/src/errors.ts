export type TelemetryErrorCode =
  | 'NOT_LOADED'
  | 'EMPTY_DATASET'
  | 'DUPLICATE_EPOCH'
  | 'EPOCH_NOT_FOUND'
  | 'INVALID_VECTOR'
  | 'INVALID_EPOCH'
  | 'INVALID_WINDOW';

/**
 * Base class for every failure raised by the telemetry core.
 * `code` is stable and is what the transport layer maps to a status.
 */
export abstract class TelemetryError extends Error {
  abstract readonly code: TelemetryErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotLoadedError extends TelemetryError {
  readonly code = 'NOT_LOADED' as const;

  constructor() {
    super('no trajectory dataset has been loaded');
  }
}

export class EmptyDatasetError extends TelemetryError {
  readonly code = 'EMPTY_DATASET' as const;

  constructor() {
    super('trajectory dataset contains no state vectors');
  }
}

export class DuplicateEpochError extends TelemetryError {
  readonly code = 'DUPLICATE_EPOCH' as const;

  constructor(readonly epoch: string) {
    super(`duplicate epoch in dataset: ${epoch}`);
  }
}

export class EpochNotFoundError extends TelemetryError {
  readonly code = 'EPOCH_NOT_FOUND' as const;

  constructor(readonly epoch: string) {
    super(`epoch not found: ${epoch}`);
  }
}

export class InvalidVectorError extends TelemetryError {
  readonly code = 'INVALID_VECTOR' as const;

  constructor(
    readonly epoch: string,
    readonly component: string,
  ) {
    super(`non-finite ${component} component at epoch ${epoch}`);
  }
}

export class InvalidEpochError extends TelemetryError {
  readonly code = 'INVALID_EPOCH' as const;

  constructor(readonly epoch: string) {
    super(`unrecognised epoch format: ${epoch}`);
  }
}

export class InvalidWindowError extends TelemetryError {
  readonly code = 'INVALID_WINDOW' as const;

  constructor(
    readonly offset: number,
    readonly limit: number | undefined,
  ) {
    super(`invalid epoch window: offset=${offset} limit=${limit ?? 'none'}`);
  }
}

export function isTelemetryError(err: unknown): err is TelemetryError {
  return err instanceof TelemetryError;
}
