/**
 * Tests for CircuitBreaker
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CircuitBreaker } from '../circuit-breaker.js';
import type { CircuitBreakerHook, CircuitState } from '../circuit-breaker.js';
import { createDefaultCircuitBreakerConfig } from '../../config/index.js';
import { CircuitOpenError } from '../../errors/index.js';
import { MetricNames, createInMemoryObservability } from '../../observability/index.js';
import { createManualClock } from '../../__mocks__/index.js';
import type { ManualClock } from '../../__mocks__/index.js';

const ENDPOINT = 'https://api.groq.com/openai/v1';

function failTimes(breaker: CircuitBreaker, key: string, times: number): void {
  for (let i = 0; i < times; i++) {
    breaker.recordFailure(key);
  }
}

describe('CircuitBreaker', () => {
  let clock: ManualClock;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = createManualClock();
    breaker = new CircuitBreaker(createDefaultCircuitBreakerConfig(), { clock: clock.now });
  });

  describe('closed state', () => {
    it('should admit unknown endpoints', () => {
      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: true });
      expect(breaker.getSnapshot(ENDPOINT)).toEqual({
        key: ENDPOINT,
        state: 'closed',
        failureCount: 0,
        retryAfterSeconds: 0,
      });
    });

    it('should stay closed below the failure threshold', () => {
      failTimes(breaker, ENDPOINT, 4);

      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: true });
      expect(breaker.getSnapshot(ENDPOINT).failureCount).toBe(4);
      expect(breaker.getSnapshot(ENDPOINT).state).toBe('closed');
    });

    it('should reset the failure count on success', () => {
      failTimes(breaker, ENDPOINT, 3);
      breaker.recordSuccess(ENDPOINT);
      failTimes(breaker, ENDPOINT, 4);

      expect(breaker.getSnapshot(ENDPOINT).state).toBe('closed');
      expect(breaker.getSnapshot(ENDPOINT).failureCount).toBe(4);
    });
  });

  describe('open state', () => {
    it('should open after five failures for sixty seconds', () => {
      failTimes(breaker, ENDPOINT, 5);

      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: false, retryAfterSeconds: 60 });
      expect(breaker.getSnapshot(ENDPOINT)).toEqual({
        key: ENDPOINT,
        state: 'open',
        failureCount: 5,
        retryAfterSeconds: 60,
      });
    });

    it('should count down the remaining cooldown', () => {
      failTimes(breaker, ENDPOINT, 5);
      clock.advance(45_000);

      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: false, retryAfterSeconds: 15 });
    });

    it('should throw CircuitOpenError from checkAdmission', () => {
      failTimes(breaker, ENDPOINT, 5);

      expect(() => breaker.checkAdmission(ENDPOINT)).toThrow(CircuitOpenError);
      expect(() => breaker.checkAdmission(ENDPOINT)).toThrow(
        `Circuit breaker open for ${ENDPOINT}. Retry after 60.0s`
      );
    });

    it('should keep endpoints independent', () => {
      failTimes(breaker, ENDPOINT, 5);

      expect(breaker.tryAdmit('https://api.openai.com/v1')).toEqual({ ok: true });
    });

    it('should restart the cooldown on further failures', () => {
      failTimes(breaker, ENDPOINT, 5);
      clock.advance(30_000);
      breaker.recordFailure(ENDPOINT);

      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: false, retryAfterSeconds: 60 });
    });
  });

  describe('reset recovery', () => {
    it('should close and admit everyone once the cooldown elapses', () => {
      failTimes(breaker, ENDPOINT, 5);
      clock.advance(60_000);

      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: true });
      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: true });
      expect(breaker.getSnapshot(ENDPOINT)).toMatchObject({ state: 'closed', failureCount: 0 });
    });

    it('should need a full threshold of new failures to reopen', () => {
      failTimes(breaker, ENDPOINT, 5);
      clock.advance(60_000);
      breaker.tryAdmit(ENDPOINT);
      failTimes(breaker, ENDPOINT, 4);

      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: true });
    });
  });

  describe('single-probe recovery', () => {
    beforeEach(() => {
      breaker = new CircuitBreaker(
        { ...createDefaultCircuitBreakerConfig(), recoveryMode: 'single-probe' },
        { clock: clock.now }
      );
      failTimes(breaker, ENDPOINT, 5);
      clock.advance(60_000);
    });

    it('should admit exactly one trial call', () => {
      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: true });
      expect(breaker.getSnapshot(ENDPOINT).state).toBe('half_open');
      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: false, retryAfterSeconds: 0 });
    });

    it('should close when the trial call succeeds', () => {
      breaker.tryAdmit(ENDPOINT);
      breaker.recordSuccess(ENDPOINT);

      expect(breaker.getSnapshot(ENDPOINT)).toMatchObject({ state: 'closed', failureCount: 0 });
      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: true });
    });

    it('should reopen immediately when the trial call fails', () => {
      breaker.tryAdmit(ENDPOINT);
      breaker.recordFailure(ENDPOINT);

      expect(breaker.getSnapshot(ENDPOINT).state).toBe('open');
      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: false, retryAfterSeconds: 60 });
    });

    it('should hand the trial slot to the next caller once abandoned', () => {
      breaker.tryAdmit(ENDPOINT);
      breaker.abandonAdmission(ENDPOINT);

      expect(breaker.getSnapshot(ENDPOINT).state).toBe('half_open');
      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: true });
      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: false, retryAfterSeconds: 0 });
    });
  });

  describe('hooks', () => {
    it('should report every transition', () => {
      const transitions: Array<[string, CircuitState, CircuitState]> = [];
      const hook: CircuitBreakerHook = {
        onStateChange: (key, from, to) => {
          transitions.push([key, from, to]);
        },
      };
      breaker.addHook(hook);

      failTimes(breaker, ENDPOINT, 5);
      clock.advance(60_000);
      breaker.tryAdmit(ENDPOINT);

      expect(transitions).toEqual([
        [ENDPOINT, 'closed', 'open'],
        [ENDPOINT, 'open', 'closed'],
      ]);
    });

    it('should keep working when a hook throws', () => {
      const observability = createInMemoryObservability();
      breaker = new CircuitBreaker(createDefaultCircuitBreakerConfig(), { clock: clock.now, observability });
      breaker.addHook({
        onStateChange: () => {
          throw new Error('hook exploded');
        },
      });

      failTimes(breaker, ENDPOINT, 5);

      expect(breaker.getSnapshot(ENDPOINT).state).toBe('open');
      const [entry] = observability.logger.getEntriesWithMessage('Circuit breaker hook failed');
      expect(entry?.context).toEqual({ endpoint: ENDPOINT, error: 'hook exploded' });
    });
  });

  describe('reset', () => {
    it('should forget a single endpoint', () => {
      failTimes(breaker, ENDPOINT, 5);
      failTimes(breaker, 'other', 2);

      breaker.reset(ENDPOINT);

      expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: true });
      expect(breaker.getSnapshot('other').failureCount).toBe(2);
    });

    it('should forget every endpoint', () => {
      failTimes(breaker, ENDPOINT, 5);
      failTimes(breaker, 'other', 2);

      breaker.reset();

      expect(breaker.getAllSnapshots()).toEqual([]);
    });
  });

  it('should emit transition and rejection metrics', () => {
    const observability = createInMemoryObservability();
    breaker = new CircuitBreaker(createDefaultCircuitBreakerConfig(), { clock: clock.now, observability });

    failTimes(breaker, ENDPOINT, 5);
    breaker.tryAdmit(ENDPOINT);
    breaker.tryAdmit(ENDPOINT);

    expect(
      observability.metrics.getCounter(MetricNames.CIRCUIT_TRANSITIONS_TOTAL, {
        endpoint: ENDPOINT,
        from: 'closed',
        to: 'open',
      })
    ).toBe(1);
    expect(observability.metrics.getCounter(MetricNames.CIRCUIT_REJECTIONS_TOTAL, { endpoint: ENDPOINT })).toBe(2);
  });

  it('should gauge the number of endpoints that are not closed', () => {
    const observability = createInMemoryObservability();
    breaker = new CircuitBreaker(createDefaultCircuitBreakerConfig(), { clock: clock.now, observability });

    failTimes(breaker, ENDPOINT, 5);
    failTimes(breaker, 'https://api.openai.com/v1', 5);
    expect(observability.metrics.getGauge(MetricNames.OPEN_CIRCUITS)).toBe(2);

    clock.advance(60_000);
    breaker.tryAdmit(ENDPOINT);
    expect(observability.metrics.getGauge(MetricNames.OPEN_CIRCUITS)).toBe(1);

    breaker.reset();
    expect(observability.metrics.getGauge(MetricNames.OPEN_CIRCUITS)).toBe(0);
  });

  it('should ignore an abandoned admission outside half-open state', () => {
    failTimes(breaker, ENDPOINT, 5);

    breaker.abandonAdmission(ENDPOINT);
    breaker.abandonAdmission('unknown');

    expect(breaker.getSnapshot(ENDPOINT).state).toBe('open');
    expect(breaker.tryAdmit(ENDPOINT)).toEqual({ ok: false, retryAfterSeconds: 60 });
  });
});
