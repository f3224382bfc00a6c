/** Source of the current time in unix seconds. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * Clock driven by the caller. Used by journal replay and tests, where every
 * operation carries its own timestamp.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  /** Move to `timestamp`. Time never moves backwards. */
  set(timestamp: number): void {
    if (!Number.isInteger(timestamp) || timestamp < this.current) {
      throw new RangeError(`Clock cannot move from ${this.current} to ${timestamp}`);
    }
    this.current = timestamp;
  }

  advance(seconds: number): void {
    this.set(this.current + seconds);
  }
}

/**
 * Wrap a clock so that successive reads never decrease.
 */
export function monotonic(clock: Clock): Clock {
  let last = Number.NEGATIVE_INFINITY;
  return {
    now: () => {
      last = Math.max(last, clock.now());
      return last;
    },
  };
}
