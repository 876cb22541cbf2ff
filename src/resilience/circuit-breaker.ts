/**
 * Failure-triggered circuit breakers keyed by upstream endpoint.
 */

import { createDefaultCircuitBreakerConfig } from '../config/index.js';
import type { CircuitBreakerConfig } from '../config/index.js';
import { CircuitOpenError } from '../errors/index.js';
import { MetricNames, createNoopObservability } from '../observability/index.js';
import type { Observability } from '../observability/index.js';
import type { Admission, Clock } from '../types/index.js';
import { monotonicClock } from '../types/index.js';

export type CircuitState = 'closed' | 'open' | 'half_open';

/**
 * Observer of breaker state transitions.
 */
export interface CircuitBreakerHook {
  onStateChange(key: string, from: CircuitState, to: CircuitState): void;
}

export type CircuitAdmission = Admission<{ retryAfterSeconds: number }>;

/**
 * Point-in-time view of one endpoint's breaker.
 */
export interface CircuitSnapshot {
  key: string;
  state: CircuitState;
  failureCount: number;
  /** Seconds left in the open window; 0 unless open */
  retryAfterSeconds: number;
}

interface CircuitEntry {
  state: CircuitState;
  failureCount: number;
  /** Clock time (ms) at which an open circuit may recover */
  openUntil: number;
  probeInFlight: boolean;
}

export interface CircuitBreakerOptions {
  clock?: Clock;
  observability?: Observability;
}

/**
 * Registry of circuit breakers, one per endpoint key.
 *
 * States:
 * - Closed: requests flow; failures are counted
 * - Open: requests are rejected until the cooldown elapses
 * - Half-Open: one trial request decides whether to close or re-open
 *   (only with `recoveryMode: 'single-probe'`)
 *
 * Only upstream invocation failures should be recorded. Local admission
 * rejections must not count, or an open window would never end.
 */
export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private readonly entries = new Map<string, CircuitEntry>();
  private readonly hooks: CircuitBreakerHook[] = [];
  private readonly clock: Clock;
  private readonly observability: Observability;

  constructor(
    config: CircuitBreakerConfig = createDefaultCircuitBreakerConfig(),
    options: CircuitBreakerOptions = {}
  ) {
    this.config = Object.freeze({ ...config });
    this.clock = options.clock ?? monotonicClock;
    this.observability = options.observability ?? createNoopObservability();
  }

  /**
   * Add a hook to be called on state changes
   */
  addHook(hook: CircuitBreakerHook): void {
    this.hooks.push(hook);
  }

  tryAdmit(key: string): CircuitAdmission {
    const entry = this.entries.get(key);
    if (!entry || entry.state === 'closed') {
      return { ok: true };
    }

    if (entry.state === 'half_open') {
      if (entry.probeInFlight) {
        return this.reject(key, 0);
      }
      entry.probeInFlight = true;
      return { ok: true };
    }

    const now = this.clock();
    if (now < entry.openUntil) {
      return this.reject(key, (entry.openUntil - now) / 1000);
    }

    if (this.config.recoveryMode === 'single-probe') {
      entry.probeInFlight = true;
      this.transition(key, entry, 'half_open');
    } else {
      entry.failureCount = 0;
      this.transition(key, entry, 'closed');
    }
    return { ok: true };
  }

  /**
   * Throwing form of {@link tryAdmit}.
   * @throws {CircuitOpenError} While the endpoint is suspended
   */
  checkAdmission(key: string): void {
    const admission = this.tryAdmit(key);
    if (!admission.ok) {
      throw new CircuitOpenError(key, admission.retryAfterSeconds);
    }
  }

  recordFailure(key: string): void {
    const entry = this.getOrCreate(key);

    if (entry.state === 'half_open') {
      this.open(key, entry);
      return;
    }

    entry.failureCount += 1;
    if (entry.failureCount >= this.config.failureThreshold) {
      this.open(key, entry);
    }
  }

  recordSuccess(key: string): void {
    const entry = this.entries.get(key);
    if (!entry) {
      return;
    }
    entry.failureCount = 0;
    entry.probeInFlight = false;
    if (entry.state !== 'closed') {
      this.transition(key, entry, 'closed');
    }
  }

  /**
   * Returns an admission without a verdict, as when the caller cancels the
   * call. In half-open state the next admission takes the freed trial slot.
   */
  abandonAdmission(key: string): void {
    const entry = this.entries.get(key);
    if (entry?.state === 'half_open') {
      entry.probeInFlight = false;
    }
  }

  getSnapshot(key: string): CircuitSnapshot {
    const entry = this.entries.get(key);
    if (!entry) {
      return { key, state: 'closed', failureCount: 0, retryAfterSeconds: 0 };
    }
    const retryAfterSeconds =
      entry.state === 'open' ? Math.max(0, (entry.openUntil - this.clock()) / 1000) : 0;
    return { key, state: entry.state, failureCount: entry.failureCount, retryAfterSeconds };
  }

  getAllSnapshots(): CircuitSnapshot[] {
    return Array.from(this.entries.keys(), key => this.getSnapshot(key));
  }

  /**
   * Forgets breaker state for `key`, or for every endpoint.
   */
  reset(key?: string): void {
    const keys = key === undefined ? Array.from(this.entries.keys()) : [key];
    for (const k of keys) {
      const entry = this.entries.get(k);
      if (!entry) continue;
      if (entry.state !== 'closed') {
        this.transition(k, entry, 'closed');
      }
      this.entries.delete(k);
    }
  }

  private getOrCreate(key: string): CircuitEntry {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { state: 'closed', failureCount: 0, openUntil: 0, probeInFlight: false };
      this.entries.set(key, entry);
    }
    return entry;
  }

  private open(key: string, entry: CircuitEntry): void {
    entry.openUntil = this.clock() + this.config.cooldownSeconds * 1000;
    entry.probeInFlight = false;
    if (entry.state !== 'open') {
      this.transition(key, entry, 'open');
    }
  }

  private countOpen(): number {
    let open = 0;
    for (const entry of this.entries.values()) {
      if (entry.state !== 'closed') open += 1;
    }
    return open;
  }

  private reject(key: string, retryAfterSeconds: number): CircuitAdmission {
    this.observability.metrics.increment(MetricNames.CIRCUIT_REJECTIONS_TOTAL, 1, { endpoint: key });
    return { ok: false, retryAfterSeconds };
  }

  private transition(key: string, entry: CircuitEntry, to: CircuitState): void {
    const from = entry.state;
    entry.state = to;

    this.observability.metrics.increment(MetricNames.CIRCUIT_TRANSITIONS_TOTAL, 1, { endpoint: key, from, to });
    this.observability.metrics.gauge(MetricNames.OPEN_CIRCUITS, this.countOpen());
    if (to === 'open') {
      this.observability.logger.warn('Circuit opened', {
        endpoint: key,
        failureCount: entry.failureCount,
        cooldownSeconds: this.config.cooldownSeconds,
      });
    } else {
      this.observability.logger.info('Circuit state changed', { endpoint: key, from, to });
    }

    for (const hook of this.hooks) {
      try {
        hook.onStateChange(key, from, to);
      } catch (error) {
        this.observability.logger.error('Circuit breaker hook failed', {
          endpoint: key,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
