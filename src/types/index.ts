/**
 * Shared types for the upstream governor.
 *
 * @module types
 */

/**
 * Monotonic millisecond clock.
 */
export type Clock = () => number;

/**
 * Delay function used for retry backoff. Rejects with the signal's reason
 * once `signal` aborts.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const monotonicClock: Clock = () => performance.now();

export const defaultSleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * One upstream a request can be routed to.
 *
 * `identity` keys rate limits (a provider name, a database alias);
 * `endpoint` keys circuit state (a base URL, a connection string).
 */
export interface UpstreamTarget {
  readonly identity: string;
  readonly endpoint: string;
}

/**
 * Tagged admission outcome shared by the rate limiter and circuit breaker.
 */
export type Admission<R extends object> = { ok: true } | ({ ok: false } & R);
