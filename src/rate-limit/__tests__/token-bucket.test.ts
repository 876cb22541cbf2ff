/**
 * Tests for TokenBucket
 */

import { describe, it, expect } from 'vitest';
import { TokenBucket } from '../token-bucket.js';
import { createManualClock } from '../../__mocks__/index.js';

describe('TokenBucket', () => {
  it('should start full', () => {
    const clock = createManualClock();
    const bucket = new TokenBucket(10, 1, clock.now);

    expect(bucket.available()).toBe(10);
  });

  it('should reject a consume larger than the balance without changing it', () => {
    const clock = createManualClock();
    const bucket = new TokenBucket(5, 1, clock.now);

    expect(bucket.consume(3)).toBe(true);
    expect(bucket.consume(3)).toBe(false);
    expect(bucket.available()).toBe(2);
    expect(bucket.consume(2)).toBe(true);
    expect(bucket.available()).toBe(0);
  });

  it('should refill continuously from elapsed time', () => {
    const clock = createManualClock();
    const bucket = new TokenBucket(10, 10, clock.now);

    bucket.consume(10);
    clock.advance(500);

    expect(bucket.available()).toBe(5);
  });

  it('should never refill past capacity', () => {
    const clock = createManualClock();
    const bucket = new TokenBucket(10, 10, clock.now);

    bucket.consume(4);
    clock.advance(60_000);

    expect(bucket.available()).toBe(10);
  });

  describe('timeUntilAvailable', () => {
    it('should be zero when the units are already there', () => {
      const bucket = new TokenBucket(10, 2, createManualClock().now);

      expect(bucket.timeUntilAvailable(4)).toBe(0);
    });

    it('should report seconds until the shortfall refills', () => {
      const clock = createManualClock();
      const bucket = new TokenBucket(10, 2, clock.now);

      bucket.consume(10);
      expect(bucket.timeUntilAvailable(4)).toBe(2);

      clock.advance(1000);
      expect(bucket.timeUntilAvailable(4)).toBe(1);
    });
  });

  describe('adjust', () => {
    it('should allow the balance to go negative', () => {
      const clock = createManualClock();
      const bucket = new TokenBucket(10, 1, clock.now);

      bucket.adjust(-15);

      expect(bucket.available()).toBe(-5);
      expect(bucket.consume(1)).toBe(false);
      expect(bucket.timeUntilAvailable(1)).toBe(6);
    });

    it('should repay debt through refill', () => {
      const clock = createManualClock();
      const bucket = new TokenBucket(10, 1, clock.now);

      bucket.adjust(-15);
      clock.advance(6000);

      expect(bucket.available()).toBe(1);
      expect(bucket.consume(1)).toBe(true);
    });

    it('should cap credits at capacity', () => {
      const clock = createManualClock();
      const bucket = new TokenBucket(10, 1, clock.now);

      bucket.consume(3);
      bucket.adjust(100);

      expect(bucket.available()).toBe(10);
    });
  });

  it('should reject negative or non-finite unit counts without touching the balance', () => {
    const clock = createManualClock();
    const bucket = new TokenBucket(10, 1, clock.now);
    bucket.consume(4);

    expect(() => bucket.consume(-3)).toThrow('Token bucket units must be a finite number >= 0, got -3');
    expect(() => bucket.consume(Number.NaN)).toThrow(RangeError);
    expect(() => bucket.timeUntilAvailable(Number.POSITIVE_INFINITY)).toThrow(RangeError);
    expect(() => bucket.adjust(Number.NaN)).toThrow('Token bucket adjustment must be finite, got NaN');
    expect(bucket.available()).toBe(6);
  });

  it('should reject a non-positive capacity or refill rate', () => {
    expect(() => new TokenBucket(0, 1)).toThrow(RangeError);
    expect(() => new TokenBucket(10, 0)).toThrow(RangeError);
    expect(() => new TokenBucket(Number.NaN, 1)).toThrow('Invalid token bucket: capacity=NaN, refillRate=1');
  });
});
