/**
 * Resilience module.
 *
 * @module resilience
 */

export {
  CircuitBreaker,
  type CircuitAdmission,
  type CircuitBreakerHook,
  type CircuitBreakerOptions,
  type CircuitSnapshot,
  type CircuitState,
} from './circuit-breaker.js';
export {
  RetryExecutor,
  isRetryableError,
  type RetryDecision,
  type RetryExecuteOptions,
  type RetryExecutorOptions,
  type RetryHook,
} from './retry.js';
