/**
 * Error taxonomy for the upstream governor.
 *
 * Every failure the governor reports is a {@link GovernorError}. Anything an
 * upstream call throws is normalised with {@link classifyUpstreamError} before
 * it reaches retry, circuit or fallback decisions.
 *
 * @module errors
 */

/**
 * Error codes.
 */
export enum GovernorErrorCode {
  RateLimitExceeded = 'rate_limit_exceeded',
  CircuitOpen = 'circuit_open',
  TransientUpstream = 'transient_upstream',
  PermanentUpstream = 'permanent_upstream',
  ProviderUnavailable = 'provider_unavailable',
  AllProvidersFailed = 'all_providers_failed',
  RequestCancelled = 'request_cancelled',
  ConfigurationError = 'configuration_error',
}

/**
 * Base governor error class.
 */
export class GovernorError extends Error {
  /** Error code */
  readonly code: GovernorErrorCode;
  /** Whether the condition may clear on its own */
  readonly retryable: boolean;
  /** Seconds until the condition is expected to clear */
  readonly retryAfterSeconds?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: GovernorErrorCode;
    message: string;
    retryable?: boolean;
    retryAfterSeconds?: number;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GovernorError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.retryAfterSeconds = options.retryAfterSeconds;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      retryAfterSeconds: this.retryAfterSeconds,
      details: this.details,
    };
  }
}

// ============================================================================
// Admission Errors (Recoverable)
// ============================================================================

/**
 * Which budget rejected the request.
 */
export type RateLimitAxis = 'requests' | 'tokens';

/**
 * Admission denied on the request-count or token-volume axis.
 *
 * `source` is `local` when the governor's own buckets refused the request and
 * `upstream` when the provider answered with HTTP 429.
 */
export class RateLimitExceededError extends GovernorError {
  readonly identity: string;
  readonly axis: RateLimitAxis;
  readonly source: 'local' | 'upstream';

  constructor(
    identity: string,
    axis: RateLimitAxis,
    retryAfterSeconds: number,
    source: 'local' | 'upstream' = 'local'
  ) {
    const label = axis === 'requests' ? 'Request' : 'Token';
    super({
      code: GovernorErrorCode.RateLimitExceeded,
      message: `${label} rate limit exceeded for ${identity}. Try again in ${retryAfterSeconds.toFixed(1)}s`,
      retryable: true,
      retryAfterSeconds,
      details: { identity, axis, source },
    });
    this.name = 'RateLimitExceededError';
    this.identity = identity;
    this.axis = axis;
    this.source = source;
  }
}

/**
 * Upstream endpoint suspended after repeated failures.
 */
export class CircuitOpenError extends GovernorError {
  readonly endpoint: string;

  constructor(endpoint: string, retryAfterSeconds: number) {
    super({
      code: GovernorErrorCode.CircuitOpen,
      message: `Circuit breaker open for ${endpoint}. Retry after ${retryAfterSeconds.toFixed(1)}s`,
      retryable: true,
      retryAfterSeconds,
      details: { endpoint },
    });
    this.name = 'CircuitOpenError';
    this.endpoint = endpoint;
  }
}

// ============================================================================
// Upstream Errors
// ============================================================================

/**
 * Connectivity failure or timeout; retried in place.
 */
export class TransientUpstreamError extends GovernorError {
  constructor(message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super({
      code: GovernorErrorCode.TransientUpstream,
      message,
      retryable: true,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'TransientUpstreamError';
  }
}

/**
 * Authentication failure, malformed request or exhausted provider quota.
 */
export class PermanentUpstreamError extends GovernorError {
  constructor(message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super({
      code: GovernorErrorCode.PermanentUpstream,
      message,
      retryable: false,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'PermanentUpstreamError';
  }
}

/**
 * Upstream skipped because it has no usable credentials or does not answer.
 */
export class ProviderUnavailableError extends GovernorError {
  constructor(identity: string) {
    super({
      code: GovernorErrorCode.ProviderUnavailable,
      message: `Provider ${identity} is not available (missing credentials or unreachable)`,
      retryable: false,
      details: { identity },
    });
    this.name = 'ProviderUnavailableError';
  }
}

// ============================================================================
// Terminal Errors
// ============================================================================

/**
 * Outcome of one upstream target within a governed request.
 */
export interface AttemptRecord {
  /** Upstream identity (rate limit key) */
  identity: string;
  /** Upstream endpoint (circuit breaker key) */
  endpoint: string;
  /** Whether the target came from the fallback chain */
  usedFallback: boolean;
  outcome: 'success' | 'failure' | 'skipped';
  /** Final error for this target, absent on success */
  error?: GovernorError;
  /** Number of upstream invocations made */
  attempts: number;
}

/**
 * Primary and every fallback failed or were skipped.
 */
export class AllProvidersFailedError extends GovernorError {
  readonly attempts: readonly AttemptRecord[];

  constructor(primary: string, attempts: readonly AttemptRecord[]) {
    const summary = attempts
      .map(a => `${a.identity}: ${a.error?.message ?? a.outcome}`)
      .join('; ');
    super({
      code: GovernorErrorCode.AllProvidersFailed,
      message: `All providers failed for ${primary} (${attempts.length} attempted): ${summary}`,
      retryable: false,
      retryAfterSeconds: earliestRetry(attempts),
      details: { primary },
    });
    this.name = 'AllProvidersFailedError';
    this.attempts = attempts;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attempts: this.attempts.map(a => ({
        identity: a.identity,
        endpoint: a.endpoint,
        usedFallback: a.usedFallback,
        outcome: a.outcome,
        attempts: a.attempts,
        error: a.error?.toJSON(),
      })),
    };
  }
}

/**
 * Caller aborted the request before any upstream succeeded.
 */
export class RequestCancelledError extends GovernorError {
  readonly attempts: readonly AttemptRecord[];

  constructor(primary: string, attempts: readonly AttemptRecord[], reason?: unknown) {
    super({
      code: GovernorErrorCode.RequestCancelled,
      message: `Request for ${primary} was cancelled`,
      retryable: false,
      details: { primary },
      cause: reason,
    });
    this.name = 'RequestCancelledError';
    this.attempts = attempts;
  }
}

/**
 * Invalid governor configuration.
 */
export class ConfigurationError extends GovernorError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super({
      code: GovernorErrorCode.ConfigurationError,
      message: issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      retryable: false,
      details: issues.length > 0 ? { issues } : undefined,
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

function earliestRetry(attempts: readonly AttemptRecord[]): number | undefined {
  let earliest: number | undefined;
  for (const attempt of attempts) {
    const hint = attempt.error?.retryAfterSeconds;
    if (hint !== undefined && (earliest === undefined || hint < earliest)) {
      earliest = hint;
    }
  }
  return earliest;
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Socket-level error codes treated as transient connectivity failures.
 */
export const TRANSIENT_NETWORK_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
]);

/**
 * Type guard for governor errors.
 */
export function isGovernorError(error: unknown): error is GovernorError {
  return error instanceof GovernorError;
}

/**
 * Reads a string `code` property off an unknown thrown value.
 */
export function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Normalises anything an upstream call throws into the governor taxonomy.
 *
 * Governor errors pass through unchanged. Timeouts and socket errors become
 * {@link TransientUpstreamError}; everything else is permanent.
 */
export function classifyUpstreamError(error: unknown): GovernorError {
  if (isGovernorError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = errorCodeOf(error);

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new TransientUpstreamError(message, { cause: error, details: { name: error.name } });
  }

  if (code !== undefined && TRANSIENT_NETWORK_CODES.has(code)) {
    return new TransientUpstreamError(message, { cause: error, details: { code } });
  }

  const cause = error instanceof Error ? error.cause : undefined;
  const causeCode = errorCodeOf(cause);
  if (causeCode !== undefined && TRANSIENT_NETWORK_CODES.has(causeCode)) {
    return new TransientUpstreamError(message, { cause: error, details: { code: causeCode } });
  }

  return new PermanentUpstreamError(message, {
    cause: error,
    details: code !== undefined ? { code } : undefined,
  });
}
