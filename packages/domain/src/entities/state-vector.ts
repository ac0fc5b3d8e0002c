import { InvalidEpochError, InvalidVectorError } from '../errors.js';
import { parseEpoch } from '../epoch.js';

export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface StateVector {
  /** Epoch label as published by the feed */
  readonly epoch: string;
  /** Epoch as UTC milliseconds; ordering key */
  readonly epochMs: number;
  /** km, dataset reference frame */
  readonly position: Vector3;
  /** km/s, dataset reference frame */
  readonly velocity: Vector3;
}

export interface StateVectorInput {
  epoch: string;
  position: Vector3;
  velocity: Vector3;
}

/** Throws InvalidVectorError naming the first non-finite component. */
export function assertFiniteStateVector(
  epoch: string,
  position: Vector3,
  velocity: Vector3,
): void {
  const components: Array<[string, number]> = [
    ['x', position.x],
    ['y', position.y],
    ['z', position.z],
    ['x_dot', velocity.x],
    ['y_dot', velocity.y],
    ['z_dot', velocity.z],
  ];
  for (const [name, value] of components) {
    if (!Number.isFinite(value)) throw new InvalidVectorError(epoch, name);
  }
}

export function createStateVector(input: StateVectorInput): StateVector {
  const epochMs = parseEpoch(input.epoch);
  if (epochMs === null) throw new InvalidEpochError(input.epoch);
  assertFiniteStateVector(input.epoch, input.position, input.velocity);

  return Object.freeze({
    epoch: input.epoch.trim(),
    epochMs,
    position: Object.freeze({ x: input.position.x, y: input.position.y, z: input.position.z }),
    velocity: Object.freeze({ x: input.velocity.x, y: input.velocity.y, z: input.velocity.z }),
  });
}

export function vectorNorm(v: Vector3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

/** Magnitude of the velocity vector, km/s. */
export function computeSpeed(record: StateVector): number {
  const { x, y, z } = record.velocity;
  if (!Number.isFinite(x)) throw new InvalidVectorError(record.epoch, 'x_dot');
  if (!Number.isFinite(y)) throw new InvalidVectorError(record.epoch, 'y_dot');
  if (!Number.isFinite(z)) throw new InvalidVectorError(record.epoch, 'z_dot');
  return vectorNorm(record.velocity);
}
