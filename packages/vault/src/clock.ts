/**
 * Logical clocks.
 *
 * Every eligibility window is evaluated against `Clock.now()` at call
 * time, in whole seconds.
 */

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }
}

export function toIsoTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}
