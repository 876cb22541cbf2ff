/**
 * Token bucket with continuous refill.
 */

import type { Clock } from '../types/index.js';
import { monotonicClock } from '../types/index.js';

/**
 * Token bucket that refills from elapsed time rather than fixed windows.
 *
 * - Tokens accrue at `refillRate` units per second, up to `capacity`
 * - `consume` never drives the balance below zero
 * - `adjust` may, to carry post-hoc usage corrections as debt
 *
 * Methods are synchronous, so each call is atomic on the event loop.
 */
export class TokenBucket {
  readonly capacity: number;
  /** Units added per second */
  readonly refillRate: number;
  private tokens: number;
  private lastRefill: number;
  private readonly clock: Clock;

  constructor(capacity: number, refillRate: number, clock: Clock = monotonicClock) {
    if (!(capacity > 0) || !(refillRate > 0)) {
      throw new RangeError(`Invalid token bucket: capacity=${capacity}, refillRate=${refillRate}`);
    }
    this.capacity = capacity;
    this.refillRate = refillRate;
    this.tokens = capacity;
    this.clock = clock;
    this.lastRefill = clock();
  }

  /**
   * Takes `n` units if available.
   * @throws {RangeError} If `n` is negative or not finite
   * @returns false, leaving the balance untouched, when fewer than `n` remain
   */
  consume(n: number = 1): boolean {
    assertUnits(n);
    this.refill();
    if (this.tokens >= n) {
      this.tokens -= n;
      return true;
    }
    return false;
  }

  /**
   * Seconds until `n` units will be available (0 if they already are).
   */
  timeUntilAvailable(n: number = 1): number {
    assertUnits(n);
    this.refill();
    if (this.tokens >= n) {
      return 0;
    }
    return (n - this.tokens) / this.refillRate;
  }

  /**
   * Adds `delta` to the balance without a floor; the ceiling stays `capacity`.
   * @throws {RangeError} If `delta` is not finite
   */
  adjust(delta: number): void {
    if (!Number.isFinite(delta)) {
      throw new RangeError(`Token bucket adjustment must be finite, got ${delta}`);
    }
    this.refill();
    this.tokens = Math.min(this.capacity, this.tokens + delta);
  }

  /**
   * Current balance after refill. Negative while repaying an adjustment.
   */
  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.clock();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    if (elapsedSeconds > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRate);
    }
    this.lastRefill = now;
  }
}

function assertUnits(n: number): void {
  if (!Number.isFinite(n) || n < 0) {
    throw new RangeError(`Token bucket units must be a finite number >= 0, got ${n}`);
  }
}
