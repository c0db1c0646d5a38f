/**
 * Trusted protocol clock. All components share one instance so that
 * "overdue" is computed against the same notion of now.
 */

export interface Clock {
  /** Whole UNIX seconds */
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * Manually advanced clock for tests and simulations.
 * Never moves backwards.
 */
export class ManualClock implements Clock {
  constructor(private current: number = 1_700_000_000) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    if (seconds < 0) {
      throw new Error('ManualClock cannot move backwards');
    }
    this.current += seconds;
  }

  set(timestamp: number): void {
    if (timestamp < this.current) {
      throw new Error('ManualClock cannot move backwards');
    }
    this.current = timestamp;
  }
}
