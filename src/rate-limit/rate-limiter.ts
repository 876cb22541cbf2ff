/**
 * Dual token-bucket rate limiter keyed by upstream identity.
 */

import { createDefaultRateLimitConfig } from '../config/index.js';
import type { RateLimitConfig } from '../config/index.js';
import { RateLimitExceededError } from '../errors/index.js';
import type { RateLimitAxis } from '../errors/index.js';
import { MetricNames, createNoopObservability } from '../observability/index.js';
import type { Observability } from '../observability/index.js';
import type { Admission, Clock } from '../types/index.js';
import { monotonicClock } from '../types/index.js';
import { TokenBucket } from './token-bucket.js';

/**
 * Why an admission was refused.
 */
export interface RateLimitRejection {
  axis: RateLimitAxis;
  retryAfterSeconds: number;
}

export type RateLimitAdmission = Admission<RateLimitRejection>;

/**
 * Admitted totals for one identity. Estimates, not reconciled actuals.
 */
export interface UsageStats {
  requests: number;
  tokens: number;
}

export interface RemainingCapacity {
  requests: number;
  tokens: number;
}

/**
 * Effective per-minute limits for one identity.
 */
export interface ResolvedLimits {
  requestsPerMinute: number;
  tokensPerMinute: number;
}

interface IdentityState {
  readonly requestBucket: TokenBucket;
  readonly tokenBucket: TokenBucket;
  readonly usage: UsageStats;
}

export interface RateLimiterOptions {
  clock?: Clock;
  observability?: Observability;
}

/**
 * Admits requests against a request-count bucket and a token-volume bucket
 * per identity. Both buckets hold one minute of budget and refill
 * continuously. Identities are tracked lazily and never evicted.
 *
 * A request is admitted only when both buckets can pay; when the token
 * bucket refuses, the request token already taken is refunded.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter();
 * const admission = limiter.tryAdmit('groq', 1200);
 * if (!admission.ok) {
 *   console.log(`retry in ${admission.retryAfterSeconds}s`);
 * }
 * ```
 */
export class RateLimiter {
  private readonly config: RateLimitConfig;
  private readonly states = new Map<string, IdentityState>();
  private readonly clock: Clock;
  private readonly observability: Observability;

  constructor(config: RateLimitConfig = createDefaultRateLimitConfig(), options: RateLimiterOptions = {}) {
    this.config = Object.freeze({
      ...config,
      providerLimits: Object.freeze({ ...config.providerLimits }),
    });
    this.clock = options.clock ?? monotonicClock;
    this.observability = options.observability ?? createNoopObservability();
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Takes one request and `estimatedUnits` tokens from `identity`'s budget.
   * @throws {RangeError} If `estimatedUnits` is negative or not finite
   */
  tryAdmit(identity: string, estimatedUnits: number): RateLimitAdmission {
    assertUnits('estimatedUnits', estimatedUnits);
    if (!this.config.enabled) {
      return { ok: true };
    }

    const state = this.getState(identity);

    if (!state.requestBucket.consume(1)) {
      return this.reject(identity, 'requests', state.requestBucket.timeUntilAvailable(1));
    }

    if (!state.tokenBucket.consume(estimatedUnits)) {
      state.requestBucket.adjust(1);
      return this.reject(identity, 'tokens', state.tokenBucket.timeUntilAvailable(estimatedUnits));
    }

    state.usage.requests += 1;
    state.usage.tokens += estimatedUnits;
    this.observability.metrics.increment(MetricNames.ADMISSIONS_TOTAL, 1, { identity });
    return { ok: true };
  }

  /**
   * Throwing form of {@link tryAdmit}.
   * @throws {RateLimitExceededError} When either budget is exhausted
   */
  checkAdmission(identity: string, estimatedUnits: number): void {
    const admission = this.tryAdmit(identity, estimatedUnits);
    if (!admission.ok) {
      throw new RateLimitExceededError(identity, admission.axis, admission.retryAfterSeconds);
    }
  }

  /**
   * Reconciles the token bucket once the real consumption is known.
   * Overuse becomes debt repaid by refill; underuse is credited back.
   * @throws {RangeError} If either count is negative or not finite
   */
  recordActualUsage(identity: string, actualUnits: number, estimatedUnits: number): void {
    assertUnits('actualUnits', actualUnits);
    assertUnits('estimatedUnits', estimatedUnits);
    if (!this.config.enabled) {
      return;
    }

    const difference = actualUnits - estimatedUnits;
    if (difference === 0) {
      return;
    }

    this.getState(identity).tokenBucket.adjust(-difference);
    this.observability.metrics.histogram(MetricNames.USAGE_ADJUSTMENT_UNITS, difference, { identity });
    this.observability.logger.trace('Token usage reconciled', { identity, actualUnits, estimatedUnits });
  }

  getUsageStats(identity: string): UsageStats {
    const usage = this.states.get(identity)?.usage;
    return usage ? { ...usage } : { requests: 0, tokens: 0 };
  }

  getAllUsageStats(): Record<string, UsageStats> {
    const stats: Record<string, UsageStats> = {};
    for (const [identity, state] of this.states) {
      stats[identity] = { ...state.usage };
    }
    return stats;
  }

  /**
   * Budget left right now, floored at zero while a bucket is in debt.
   */
  getRemainingCapacity(identity: string): RemainingCapacity {
    const state = this.getState(identity);
    return {
      requests: Math.max(0, state.requestBucket.available()),
      tokens: Math.max(0, state.tokenBucket.available()),
    };
  }

  getLimits(identity: string): ResolvedLimits {
    const override = Object.prototype.hasOwnProperty.call(this.config.providerLimits, identity)
      ? this.config.providerLimits[identity]
      : undefined;
    return {
      requestsPerMinute: override?.requestsPerMinute ?? this.config.requestsPerMinute,
      tokensPerMinute: override?.tokensPerMinute ?? this.config.tokensPerMinute,
    };
  }

  private getState(identity: string): IdentityState {
    let state = this.states.get(identity);
    if (!state) {
      const limits = this.getLimits(identity);
      state = {
        requestBucket: new TokenBucket(limits.requestsPerMinute, limits.requestsPerMinute / 60, this.clock),
        tokenBucket: new TokenBucket(limits.tokensPerMinute, limits.tokensPerMinute / 60, this.clock),
        usage: { requests: 0, tokens: 0 },
      };
      this.states.set(identity, state);
    }
    return state;
  }

  private reject(identity: string, axis: RateLimitAxis, retryAfterSeconds: number): RateLimitAdmission {
    this.observability.metrics.increment(MetricNames.RATE_LIMIT_REJECTIONS_TOTAL, 1, { identity, axis });
    this.observability.logger.debug('Rate limit rejected request', { identity, axis, retryAfterSeconds });
    return { ok: false, axis, retryAfterSeconds };
  }
}

/**
 * Whether `units` is a usable token count.
 */
export function isValidUnits(units: number): boolean {
  return Number.isFinite(units) && units >= 0;
}

function assertUnits(name: string, units: number): void {
  if (!isValidUnits(units)) {
    throw new RangeError(`${name} must be a finite number >= 0, got ${units}`);
  }
}
