/**
 * Tests for RetryExecutor
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RetryExecutor, isRetryableError } from '../retry.js';
import type { RetryHook } from '../retry.js';
import { createDefaultRetryConfig } from '../../config/index.js';
import type { RetryConfig } from '../../config/index.js';
import {
  PermanentUpstreamError,
  RateLimitExceededError,
  TransientUpstreamError,
} from '../../errors/index.js';
import { MetricNames, createInMemoryObservability } from '../../observability/index.js';
import { defaultSleep } from '../../types/index.js';

function noJitter(overrides: Partial<RetryConfig> = {}): RetryConfig {
  return { ...createDefaultRetryConfig(), jitter: 0, ...overrides };
}

describe('RetryExecutor', () => {
  let sleeps: number[];
  let sleep: (ms: number) => Promise<void>;

  beforeEach(() => {
    sleeps = [];
    sleep = async (ms: number) => {
      sleeps.push(ms);
    };
  });

  it('should return the first successful result', async () => {
    const executor = new RetryExecutor(noJitter(), { sleep });
    const operation = vi.fn().mockResolvedValue('done');

    await expect(executor.execute(operation)).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledWith(1);
    expect(sleeps).toEqual([]);
  });

  it('should retry transient failures with exponential backoff', async () => {
    const executor = new RetryExecutor(noJitter(), { sleep });
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientUpstreamError('reset'))
      .mockRejectedValueOnce(new TransientUpstreamError('reset'))
      .mockResolvedValue('done');

    await expect(executor.execute(operation)).resolves.toBe('done');
    expect(operation.mock.calls).toEqual([[1], [2], [3]]);
    expect(sleeps).toEqual([1000, 2000]);
  });

  it('should give up after maxAttempts with the last error', async () => {
    const executor = new RetryExecutor(noJitter(), { sleep });
    const last = new TransientUpstreamError('third');
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientUpstreamError('first'))
      .mockRejectedValueOnce(new TransientUpstreamError('second'))
      .mockRejectedValueOnce(last);

    await expect(executor.execute(operation)).rejects.toBe(last);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([1000, 2000]);
  });

  it('should not retry permanent failures', async () => {
    const executor = new RetryExecutor(noJitter(), { sleep });
    const error = new PermanentUpstreamError('bad request');
    const operation = vi.fn().mockRejectedValue(error);

    await expect(executor.execute(operation)).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should not retry rate limit rejections', async () => {
    const executor = new RetryExecutor(noJitter(), { sleep });
    const operation = vi.fn().mockRejectedValue(new RateLimitExceededError('groq', 'requests', 2));

    await expect(executor.execute(operation)).rejects.toBeInstanceOf(RateLimitExceededError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should not retry errors outside the taxonomy', async () => {
    const executor = new RetryExecutor(noJitter(), { sleep });
    const operation = vi.fn().mockRejectedValue(new Error('unclassified'));

    await expect(executor.execute(operation)).rejects.toThrow('unclassified');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  describe('calculateDelay', () => {
    it('should grow by the multiplier and cap at maxDelayMs', () => {
      const executor = new RetryExecutor(noJitter({ minDelayMs: 1000, maxDelayMs: 5000 }));

      expect([1, 2, 3, 4].map(a => executor.calculateDelay(a))).toEqual([1000, 2000, 4000, 5000]);
    });

    it('should spread the delay by the jitter fraction', () => {
      const low = new RetryExecutor(createDefaultRetryConfig(), { random: () => 0 });
      const mid = new RetryExecutor(createDefaultRetryConfig(), { random: () => 0.5 });

      expect(low.calculateDelay(2)).toBe(1800);
      expect(mid.calculateDelay(2)).toBe(2000);
    });

    it('should keep the spread delay within the configured bounds', () => {
      const low = new RetryExecutor(createDefaultRetryConfig(), { random: () => 0 });
      const high = new RetryExecutor(createDefaultRetryConfig(), { random: () => 0.999 });

      expect(low.calculateDelay(1)).toBe(1000);
      expect(high.calculateDelay(5)).toBe(10_000);
    });
  });

  describe('hooks', () => {
    it('should stop retrying when a hook aborts', async () => {
      const executor = new RetryExecutor(noJitter(), { sleep });
      executor.addHook({ onRetry: () => ({ type: 'abort' }) });
      const operation = vi.fn().mockRejectedValue(new TransientUpstreamError('reset'));

      await expect(executor.execute(operation)).rejects.toThrow('reset');
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should use the delay a hook chooses', async () => {
      const executor = new RetryExecutor(noJitter(), { sleep });
      const hook: RetryHook = { onRetry: vi.fn().mockReturnValue({ type: 'retry', delayMs: 5 }) };
      executor.addHook(hook);
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new TransientUpstreamError('reset'))
        .mockResolvedValue('done');

      await executor.execute(operation);

      expect(sleeps).toEqual([5]);
      expect(hook.onRetry).toHaveBeenCalledWith(1, expect.any(TransientUpstreamError), 1000);
    });
  });

  it('should not start once the signal is aborted', async () => {
    const executor = new RetryExecutor(noJitter(), { sleep });
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn().mockResolvedValue('done');

    await expect(executor.execute(operation, { signal: controller.signal })).rejects.toHaveProperty(
      'name',
      'AbortError'
    );
    expect(operation).not.toHaveBeenCalled();
  });

  it('should stop waiting between attempts when the signal aborts', async () => {
    const executor = new RetryExecutor(noJitter({ minDelayMs: 60_000, maxDelayMs: 60_000 }));
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      setTimeout(() => controller.abort(), 0);
      throw new TransientUpstreamError('reset');
    });

    await expect(executor.execute(operation, { signal: controller.signal })).rejects.toHaveProperty(
      'name',
      'AbortError'
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should count retries with the given tags', async () => {
    const observability = createInMemoryObservability();
    const executor = new RetryExecutor(noJitter(), { sleep, observability });
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientUpstreamError('reset'))
      .mockResolvedValue('done');

    await executor.execute(operation, { tags: { identity: 'groq' } });

    expect(observability.metrics.getCounter(MetricNames.RETRIES_TOTAL, { identity: 'groq' })).toBe(1);
  });

  it('should classify only retryable transient upstream errors as retryable', () => {
    expect(isRetryableError(new TransientUpstreamError('x'))).toBe(true);
    expect(isRetryableError(new PermanentUpstreamError('x'))).toBe(false);
    expect(isRetryableError(new RateLimitExceededError('groq', 'tokens', 1))).toBe(false);
    expect(isRetryableError(new Error('x'))).toBe(false);
  });
});

describe('defaultSleep', () => {
  it('should resolve after the delay', async () => {
    await expect(defaultSleep(1)).resolves.toBeUndefined();
  });

  it('should reject with the abort reason', async () => {
    const controller = new AbortController();
    const pending = defaultSleep(60_000, controller.signal);

    controller.abort(new Error('stop'));

    await expect(pending).rejects.toThrow('stop');
  });

  it('should reject at once for an aborted signal', async () => {
    await expect(defaultSleep(60_000, AbortSignal.abort(new Error('gone')))).rejects.toThrow('gone');
  });
});
