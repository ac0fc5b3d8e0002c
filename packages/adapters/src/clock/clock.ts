import type { ClockPort } from '@iss-tracker/domain';

/** Wall-clock implementation used by the running service. */
export class WallClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Settable clock for tests and for answering "now" against a chosen instant.
 * Unlike the wall clock it only moves when told to.
 */
export class FixedClock implements ClockPort {
  private currentMs: number;

  constructor(start: Date | number) {
    this.currentMs = typeof start === 'number' ? start : start.getTime();
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  set(instant: Date | number): void {
    this.currentMs = typeof instant === 'number' ? instant : instant.getTime();
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}
