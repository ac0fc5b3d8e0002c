import { createStateVector, isTelemetryError } from '@iss-tracker/domain';
import type { StateVector } from '@iss-tracker/domain';
import { OemParseError } from '../errors.js';

/** Fields of one OEM ephemeris line, in document order. */
export const STATE_VECTOR_FIELDS = ['X', 'Y', 'Z', 'X_DOT', 'Y_DOT', 'Z_DOT'] as const;

export function parseNumber(where: string, field: string, raw: string | null | undefined): number {
  const text = raw?.trim();
  if (!text) throw new OemParseError(`${where}: missing ${field}`);
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new OemParseError(`${where}: ${field} is not a finite number (${text})`);
  }
  return value;
}

/** `values` holds X, Y, Z, X_DOT, Y_DOT, Z_DOT. */
export function buildStateVector(where: string, epoch: string, values: readonly number[]): StateVector {
  const [x, y, z, vx, vy, vz] = values;
  try {
    return createStateVector({
      epoch,
      position: { x, y, z },
      velocity: { x: vx, y: vy, z: vz },
    });
  } catch (err) {
    if (isTelemetryError(err)) throw new OemParseError(`${where}: ${err.message}`, { cause: err });
    throw err;
  }
}
