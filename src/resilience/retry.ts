/**
 * Retry executor with exponential backoff and jitter
 */

import { createDefaultRetryConfig } from '../config/index.js';
import type { RetryConfig } from '../config/index.js';
import { GovernorErrorCode, isGovernorError } from '../errors/index.js';
import type { GovernorError } from '../errors/index.js';
import { MetricNames, createNoopObservability } from '../observability/index.js';
import type { Observability } from '../observability/index.js';
import type { Sleep } from '../types/index.js';
import { defaultSleep } from '../types/index.js';

/**
 * Decision returned by a retry hook.
 */
export type RetryDecision =
  | { type: 'retry'; delayMs: number }
  | { type: 'abort' }
  | { type: 'default' };

/**
 * Hook invoked before each backoff sleep.
 */
export interface RetryHook {
  onRetry(attempt: number, error: GovernorError, delayMs: number): RetryDecision | void;
}

export interface RetryExecutorOptions {
  sleep?: Sleep;
  /** Uniform [0, 1) source for jitter */
  random?: () => number;
  observability?: Observability;
}

export interface RetryExecuteOptions {
  signal?: AbortSignal;
  /** Extra metric tags and log context for this execution */
  tags?: Record<string, string>;
}

/**
 * Whether the executor will retry `error`: only retryable transient
 * upstream failures qualify.
 */
export function isRetryableError(error: unknown): error is GovernorError {
  return isGovernorError(error) && error.retryable && error.code === GovernorErrorCode.TransientUpstream;
}

/**
 * Executes operations with retry logic and exponential backoff
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly hooks: RetryHook[] = [];
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly observability: Observability;

  constructor(config: RetryConfig = createDefaultRetryConfig(), options: RetryExecutorOptions = {}) {
    this.config = Object.freeze({ ...config });
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.observability = options.observability ?? createNoopObservability();
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Add a hook to be called on retry attempts
   */
  addHook(hook: RetryHook): void {
    this.hooks.push(hook);
  }

  /**
   * Runs `operation` until it succeeds, fails with a non-transient error,
   * or `maxAttempts` invocations have been made.
   *
   * @param operation - Receives the 1-indexed attempt number
   * @throws The last error, or the signal's reason once aborted
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryExecuteOptions = {}
  ): Promise<T> {
    const { signal, tags = {} } = options;

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();

      try {
        return await operation(attempt);
      } catch (error) {
        if (!isRetryableError(error) || attempt >= this.config.maxAttempts) {
          throw error;
        }

        const delay = this.calculateDelay(attempt);
        let finalDelay = delay;
        for (const hook of this.hooks) {
          const decision = hook.onRetry(attempt, error, delay);
          if (!decision) continue;
          if (decision.type === 'abort') {
            throw error;
          }
          if (decision.type === 'retry') {
            finalDelay = decision.delayMs;
          }
        }

        this.observability.metrics.increment(MetricNames.RETRIES_TOTAL, 1, tags);
        this.observability.logger.debug('Retrying after transient failure', {
          ...tags,
          attempt,
          delayMs: finalDelay,
          error: error.message,
        });

        await this.sleep(finalDelay, signal);
      }
    }
  }

  /**
   * Backoff before the retry that follows `attempt` (1-indexed):
   * `minDelayMs * multiplier^(attempt-1)` spread by up to `jitter` in
   * either direction, then clamped to `[minDelayMs, maxDelayMs]`.
   */
  calculateDelay(attempt: number): number {
    const { minDelayMs, maxDelayMs, multiplier, jitter } = this.config;
    const exponential = Math.min(minDelayMs * Math.pow(multiplier, attempt - 1), maxDelayMs);
    const spread = exponential * jitter * (this.random() * 2 - 1);
    return Math.floor(Math.min(Math.max(exponential + spread, minDelayMs), maxDelayMs));
  }
}
