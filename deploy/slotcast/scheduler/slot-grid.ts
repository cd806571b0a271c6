/**
 * Slot grid arithmetic. Slots are multiples of the cadence counted from the
 * Unix epoch, so every real-world UTC offset lands on the same boundaries.
 *
 * @module deploy/slotcast/scheduler/slot-grid
 */

export const MINUTE_MS = 60 * 1000;
export const DEFAULT_CADENCE_MS = 15 * MINUTE_MS;
export const SLOTS_PER_DAY = (24 * 60 * MINUTE_MS) / DEFAULT_CADENCE_MS;

export class SlotGrid {
  constructor(readonly cadenceMs: number = DEFAULT_CADENCE_MS) {
    if (!Number.isInteger(cadenceMs) || cadenceMs <= 0) {
      throw new RangeError(`cadenceMs must be a positive integer (got ${cadenceMs})`);
    }
  }

  isAligned(time: Date): boolean {
    return time.getTime() % this.cadenceMs === 0;
  }

  /** Boundary at or after `time`. */
  ceil(time: Date): Date {
    const ms = time.getTime();
    const rem = ms % this.cadenceMs;
    return rem === 0 ? new Date(ms) : new Date(ms - rem + this.cadenceMs);
  }

  /** Boundary strictly after `time`. */
  nextBoundaryAfter(time: Date): Date {
    const ms = time.getTime();
    return new Date(ms - (ms % this.cadenceMs) + this.cadenceMs);
  }

  advance(time: Date, steps = 1): Date {
    return new Date(time.getTime() + steps * this.cadenceMs);
  }

  /** Canonical key for a slot, used to compare ISO strings from disk. */
  key(time: Date | string): string {
    return (typeof time === 'string' ? new Date(time) : time).toISOString();
  }
}
