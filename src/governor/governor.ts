/**
 * Admission, retry and fallback around calls to rate-limited upstreams.
 */

import { createDefaultGovernorConfig, validateGovernorConfig } from '../config/index.js';
import type { GovernorConfig } from '../config/index.js';
import {
  AllProvidersFailedError,
  ProviderUnavailableError,
  RequestCancelledError,
  classifyUpstreamError,
} from '../errors/index.js';
import type { AttemptRecord } from '../errors/index.js';
import { MetricNames, createConsoleObservability } from '../observability/index.js';
import type { Logger, Observability } from '../observability/index.js';
import { createAvailabilityCheck, getProvider } from '../providers/catalog.js';
import type { AvailabilityCheck } from '../providers/catalog.js';
import { RateLimiter, isValidUnits } from '../rate-limit/rate-limiter.js';
import { CircuitBreaker } from '../resilience/circuit-breaker.js';
import { RetryExecutor } from '../resilience/retry.js';
import type { Clock, Sleep, UpstreamTarget } from '../types/index.js';
import { monotonicClock } from '../types/index.js';
import { buildRoutingOrder, resolveFallbackChain } from './fallback.js';
import type { FallbackChain, RoutedTarget } from './fallback.js';

/**
 * Passed to the upstream call on every invocation.
 */
export interface CallContext {
  /** 1-indexed invocation number against this target */
  attempt: number;
  /** Units reserved from the token budget for this invocation */
  estimatedUnits: number;
  usedFallback: boolean;
  signal?: AbortSignal;
}

export interface UpstreamResponse<T> {
  content: T;
  /** Units actually consumed, when the upstream reports them */
  actualUnits?: number;
}

export type UpstreamCall<T> = (target: UpstreamTarget, context: CallContext) => Promise<UpstreamResponse<T>>;

export interface GovernorResult<T> {
  content: T;
  identityUsed: string;
  endpointUsed: string;
  usedFallback: boolean;
  /** One record per target considered, ending with the successful one */
  attempts: AttemptRecord[];
}

export interface ExecuteOptions {
  /** Token estimate, fixed or per target. Defaults to the configured estimate */
  estimatedUnits?: number | ((target: UpstreamTarget) => number);
  /** Overrides the configured chain for the primary */
  fallbackChain?: FallbackChain;
  signal?: AbortSignal;
}

export interface ResilienceGovernorOptions {
  config?: GovernorConfig;
  rateLimiter?: RateLimiter;
  circuitBreaker?: CircuitBreaker;
  retryExecutor?: RetryExecutor;
  /** Defaults to the provider catalog credential and reachability check */
  isAvailable?: AvailabilityCheck;
  observability?: Observability;
  clock?: Clock;
  sleep?: Sleep;
}

/**
 * Routing target for a bare identity: catalog providers use their base URL
 * as endpoint, anything else uses the identity itself.
 */
export function resolveTarget(primary: string | UpstreamTarget): UpstreamTarget {
  if (typeof primary !== 'string') {
    return { identity: primary.identity, endpoint: primary.endpoint };
  }
  const provider = getProvider(primary);
  return { identity: primary, endpoint: provider ? provider.baseUrl : primary };
}

/**
 * Wraps upstream calls with rate-limit admission, circuit admission,
 * retry of transient failures and ordered fallback.
 *
 * Each target in the routing order (primary, then the fallback chain) is
 * attempted in turn. Per invocation the governor checks the identity's rate
 * limit, then the endpoint's circuit; either rejection ends the target.
 * Transient failures are retried with backoff, other failures move on to
 * the next target. When every target fails or is skipped the caller gets a
 * single {@link AllProvidersFailedError} listing each attempt in order.
 *
 * @example
 * ```typescript
 * const governor = new ResilienceGovernor();
 * const result = await governor.execute('groq', createChatCompletionCall({ messages }));
 * console.log(result.identityUsed, result.content);
 * ```
 */
export class ResilienceGovernor {
  readonly config: GovernorConfig;
  readonly rateLimiter: RateLimiter;
  readonly circuitBreaker: CircuitBreaker;
  readonly retryExecutor: RetryExecutor;
  private readonly isAvailable: AvailabilityCheck;
  private readonly observability: Observability;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: ResilienceGovernorOptions = {}) {
    this.config = validateGovernorConfig(options.config ?? createDefaultGovernorConfig());
    this.clock = options.clock ?? monotonicClock;
    this.observability = options.observability ?? createConsoleObservability(this.config.logLevel);
    this.logger = this.observability.logger.child({ component: 'governor' });
    this.isAvailable = options.isAvailable ?? createAvailabilityCheck();

    const shared = { clock: this.clock, observability: this.observability };
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(this.config.rateLimit, shared);
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker(this.config.circuitBreaker, shared);
    this.retryExecutor =
      options.retryExecutor ??
      new RetryExecutor(this.config.retry, { sleep: options.sleep, observability: this.observability });
  }

  /**
   * Runs `call` against `primary`, falling back along its chain.
   *
   * @throws {AllProvidersFailedError} When every target failed or was skipped
   * @throws {RequestCancelledError} When `signal` aborts before a success
   * @throws {RangeError} When the estimate for a target is negative or not finite
   */
  async execute<T>(
    primary: string | UpstreamTarget,
    call: UpstreamCall<T>,
    options: ExecuteOptions = {}
  ): Promise<GovernorResult<T>> {
    const primaryTarget = resolveTarget(primary);
    const chain = options.fallbackChain ?? resolveFallbackChain(this.config.fallbackChains, primaryTarget.identity);
    const order = buildRoutingOrder(primaryTarget, chain);
    const { signal } = options;
    const attempts: AttemptRecord[] = [];
    const started = this.clock();

    for (const target of order) {
      if (signal?.aborted) {
        throw this.cancelled(primaryTarget, attempts, started, signal);
      }

      if (target.usedFallback) {
        this.observability.metrics.increment(MetricNames.FALLBACKS_TOTAL, 1, {
          primary: primaryTarget.identity,
          identity: target.identity,
        });
        this.logger.info('Falling back to alternate upstream', {
          primary: primaryTarget.identity,
          identity: target.identity,
        });
      }

      if (!(await this.isAvailable(target))) {
        this.logger.debug('Skipping unavailable upstream', { identity: target.identity });
        attempts.push({
          identity: target.identity,
          endpoint: target.endpoint,
          usedFallback: target.usedFallback,
          outcome: 'skipped',
          error: new ProviderUnavailableError(target.identity),
          attempts: 0,
        });
        continue;
      }

      const estimatedUnits = this.resolveEstimate(options.estimatedUnits, target);
      let invocations = 0;

      try {
        const response = await this.retryExecutor.execute(
          async attempt => {
            this.rateLimiter.checkAdmission(target.identity, estimatedUnits);
            this.circuitBreaker.checkAdmission(target.endpoint);
            invocations += 1;
            return this.invoke(target, call, { attempt, estimatedUnits, usedFallback: target.usedFallback, signal });
          },
          { signal, tags: { identity: target.identity } }
        );

        if (response.actualUnits !== undefined) {
          this.reconcile(target, response.actualUnits, estimatedUnits);
        }
        this.circuitBreaker.recordSuccess(target.endpoint);

        attempts.push({
          identity: target.identity,
          endpoint: target.endpoint,
          usedFallback: target.usedFallback,
          outcome: 'success',
          attempts: invocations,
        });
        this.recordOutcome(primaryTarget, 'success', started);

        return {
          content: response.content,
          identityUsed: target.identity,
          endpointUsed: target.endpoint,
          usedFallback: target.usedFallback,
          attempts,
        };
      } catch (error) {
        if (signal?.aborted) {
          throw this.cancelled(primaryTarget, attempts, started, signal);
        }

        const failure = classifyUpstreamError(error);
        attempts.push({
          identity: target.identity,
          endpoint: target.endpoint,
          usedFallback: target.usedFallback,
          outcome: 'failure',
          error: failure,
          attempts: invocations,
        });
        this.observability.metrics.increment(MetricNames.UPSTREAM_FAILURES_TOTAL, 1, {
          identity: target.identity,
          code: failure.code,
        });
        this.logger.warn('Upstream attempt failed', {
          identity: target.identity,
          code: failure.code,
          invocations,
          error: failure.message,
        });
      }
    }

    this.recordOutcome(primaryTarget, 'failure', started);
    const aggregate = new AllProvidersFailedError(primaryTarget.identity, attempts);
    this.logger.error('All upstreams failed', { primary: primaryTarget.identity, attempted: attempts.length });
    throw aggregate;
  }

  private async invoke<T>(
    target: RoutedTarget,
    call: UpstreamCall<T>,
    context: CallContext
  ): Promise<UpstreamResponse<T>> {
    const upstream = { identity: target.identity, endpoint: target.endpoint };
    try {
      return await call(upstream, context);
    } catch (error) {
      // A caller abort says nothing about the endpoint's health.
      if (context.signal?.aborted) {
        this.circuitBreaker.abandonAdmission(target.endpoint);
        throw error;
      }
      this.circuitBreaker.recordFailure(target.endpoint);
      throw classifyUpstreamError(error);
    }
  }

  private resolveEstimate(estimate: ExecuteOptions['estimatedUnits'], target: UpstreamTarget): number {
    const units =
      typeof estimate === 'function'
        ? estimate({ identity: target.identity, endpoint: target.endpoint })
        : estimate ?? this.config.defaultEstimatedUnits;
    if (!isValidUnits(units)) {
      throw new RangeError(`estimatedUnits for ${target.identity} must be a finite number >= 0, got ${units}`);
    }
    return units;
  }

  private reconcile(target: UpstreamTarget, actualUnits: number, estimatedUnits: number): void {
    if (!isValidUnits(actualUnits)) {
      this.logger.warn('Ignoring invalid usage report', { identity: target.identity, actualUnits });
      return;
    }
    this.rateLimiter.recordActualUsage(target.identity, actualUnits, estimatedUnits);
  }

  private cancelled(
    primary: UpstreamTarget,
    attempts: AttemptRecord[],
    started: number,
    signal: AbortSignal
  ): RequestCancelledError {
    this.recordOutcome(primary, 'cancelled', started);
    this.logger.info('Request cancelled', { primary: primary.identity, attempted: attempts.length });
    return new RequestCancelledError(primary.identity, attempts, signal.reason);
  }

  private recordOutcome(primary: UpstreamTarget, outcome: string, started: number): void {
    const tags = { primary: primary.identity, outcome };
    this.observability.metrics.increment(MetricNames.REQUESTS_TOTAL, 1, tags);
    this.observability.metrics.timing(MetricNames.REQUEST_DURATION_MS, this.clock() - started, tags);
  }
}
