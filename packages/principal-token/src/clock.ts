/**
 * clock.ts
 *
 * Source of "now" for maturity checks. The reference deployment measures
 * maturity in block heights, so ManualClock can also mine blocks.
 */

export interface Clock {
  /** Current monotonic clock value (block height, or unix seconds). */
  now(): number;
}

/** Unix time in whole seconds. */
export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/** Clock advanced by hand; used by simulations and tests. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  /** Jump to `value`. The clock never moves backwards. */
  set(value: number): void {
    if (value < this.current) {
      throw new RangeError(`Clock cannot move backwards: ${value} < ${this.current}`);
    }
    this.current = value;
  }

  advance(delta: number): void {
    this.set(this.current + delta);
  }

  /** Advance by n blocks. */
  mine(blocks = 1): void {
    this.advance(blocks);
  }
}
