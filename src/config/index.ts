/**
 * Governor configuration.
 *
 * Defaults, zod validation, a fluent builder and environment loading.
 * Validated configurations are deeply frozen.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { findFallbackTableIssues } from '../governor/fallback.js';
import type { FallbackChain, FallbackTable } from '../governor/fallback.js';
import { LogLevel, parseLogLevel } from '../observability/index.js';
import { DEFAULT_FALLBACK_CHAINS } from '../providers/catalog.js';
import type { Environment } from '../providers/catalog.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Per-identity override of the global rate limits.
 */
export interface ProviderLimitOverride {
  readonly requestsPerMinute?: number;
  readonly tokensPerMinute?: number;
}

export interface RateLimitConfig {
  readonly requestsPerMinute: number;
  readonly tokensPerMinute: number;
  /** When false every admission succeeds and no state is kept */
  readonly enabled: boolean;
  readonly providerLimits: Readonly<Record<string, ProviderLimitOverride>>;
}

/**
 * What happens once an open circuit's cooldown has elapsed.
 *
 * - `reset`: the next caller closes the circuit and everyone is admitted
 * - `single-probe`: one caller is admitted in half-open state; its outcome
 *   closes or re-opens the circuit
 */
export type RecoveryMode = 'reset' | 'single-probe';

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit */
  readonly failureThreshold: number;
  readonly cooldownSeconds: number;
  readonly recoveryMode: RecoveryMode;
}

export interface RetryConfig {
  /** Total invocations per target, including the first */
  readonly maxAttempts: number;
  readonly minDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
  /** Jitter as a fraction of the delay (0-1) */
  readonly jitter: number;
}

export interface GovernorConfig {
  readonly rateLimit: RateLimitConfig;
  readonly circuitBreaker: CircuitBreakerConfig;
  readonly retry: RetryConfig;
  readonly fallbackChains: FallbackTable;
  /** Token estimate used when a request supplies none */
  readonly defaultEstimatedUnits: number;
  readonly logLevel: LogLevel;
}

// ============================================================================
// Defaults
// ============================================================================

/**
 * Published free-tier limits of the catalog providers.
 */
export const DEFAULT_PROVIDER_LIMITS: Readonly<Record<string, ProviderLimitOverride>> = Object.freeze({
  openai: { requestsPerMinute: 60, tokensPerMinute: 150_000 },
  groq: { requestsPerMinute: 30, tokensPerMinute: 100_000 },
  openrouter: { requestsPerMinute: 100, tokensPerMinute: 200_000 },
  anthropic: { requestsPerMinute: 50, tokensPerMinute: 100_000 },
  ollama: { requestsPerMinute: 1000, tokensPerMinute: 10_000_000 },
});

export const DEFAULT_ESTIMATED_UNITS = 1000;

export function createDefaultRateLimitConfig(): RateLimitConfig {
  return {
    requestsPerMinute: 20,
    tokensPerMinute: 100_000,
    enabled: true,
    providerLimits: { ...DEFAULT_PROVIDER_LIMITS },
  };
}

export function createDefaultCircuitBreakerConfig(): CircuitBreakerConfig {
  return {
    failureThreshold: 5,
    cooldownSeconds: 60,
    recoveryMode: 'reset',
  };
}

export function createDefaultRetryConfig(): RetryConfig {
  return {
    maxAttempts: 3,
    minDelayMs: 1000,
    maxDelayMs: 10_000,
    multiplier: 2,
    jitter: 0.1,
  };
}

export function createDefaultGovernorConfig(): GovernorConfig {
  return {
    rateLimit: createDefaultRateLimitConfig(),
    circuitBreaker: createDefaultCircuitBreakerConfig(),
    retry: createDefaultRetryConfig(),
    fallbackChains: copyFallbackTable(DEFAULT_FALLBACK_CHAINS),
    defaultEstimatedUnits: DEFAULT_ESTIMATED_UNITS,
    logLevel: LogLevel.INFO,
  };
}

// ============================================================================
// Validation
// ============================================================================

const ProviderLimitOverrideSchema = z
  .object({
    requestsPerMinute: z.number().positive().optional(),
    tokensPerMinute: z.number().positive().optional(),
  })
  .strict();

const RateLimitConfigSchema = z.object({
  requestsPerMinute: z.number().positive(),
  tokensPerMinute: z.number().positive(),
  enabled: z.boolean(),
  providerLimits: z.record(z.string(), ProviderLimitOverrideSchema),
});

const CircuitBreakerConfigSchema = z.object({
  failureThreshold: z.number().int().positive(),
  cooldownSeconds: z.number().positive(),
  recoveryMode: z.enum(['reset', 'single-probe']),
});

const RetryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1),
    minDelayMs: z.number().min(0),
    maxDelayMs: z.number().min(0),
    multiplier: z.number().min(1),
    jitter: z.number().min(0).max(1),
  })
  .refine(retry => retry.maxDelayMs >= retry.minDelayMs, {
    message: 'maxDelayMs must be at least minDelayMs',
    path: ['maxDelayMs'],
  });

const UpstreamTargetSchema = z.object({
  identity: z.string().min(1),
  endpoint: z.string().min(1),
});

const GovernorConfigSchema = z.object({
  rateLimit: RateLimitConfigSchema,
  circuitBreaker: CircuitBreakerConfigSchema,
  retry: RetryConfigSchema,
  fallbackChains: z.record(z.string(), z.array(UpstreamTargetSchema)),
  defaultEstimatedUnits: z.number().positive(),
  logLevel: z.nativeEnum(LogLevel),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function copyFallbackTable(table: FallbackTable): Record<string, FallbackChain> {
  return Object.fromEntries(
    Object.entries(table).map(([primary, chain]) => [
      primary,
      chain.map(t => ({ identity: t.identity, endpoint: t.endpoint })),
    ])
  );
}

/**
 * Validates a configuration and returns a deeply frozen copy.
 * @throws {ConfigurationError} Listing every problem found
 */
export function validateGovernorConfig(config: GovernorConfig): GovernorConfig {
  const result = GovernorConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError('Invalid governor configuration', formatIssues(result.error));
  }

  const fallbackIssues = findFallbackTableIssues(result.data.fallbackChains);
  if (fallbackIssues.length > 0) {
    throw new ConfigurationError('Invalid governor configuration', fallbackIssues);
  }

  return deepFreeze(result.data);
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Fluent builder over {@link GovernorConfig}; `build()` validates.
 *
 * @example
 * ```typescript
 * const config = new GovernorConfigBuilder()
 *   .providerLimit('groq', { requestsPerMinute: 10 })
 *   .circuitBreaker({ recoveryMode: 'single-probe' })
 *   .fallbackChain('groq', [providerTarget('ollama')])
 *   .build();
 * ```
 */
export class GovernorConfigBuilder {
  private config: GovernorConfig;

  constructor(base: GovernorConfig = createDefaultGovernorConfig()) {
    this.config = base;
  }

  rateLimit(overrides: Partial<RateLimitConfig>): this {
    this.config = { ...this.config, rateLimit: { ...this.config.rateLimit, ...overrides } };
    return this;
  }

  providerLimit(identity: string, limit: ProviderLimitOverride): this {
    const providerLimits = { ...this.config.rateLimit.providerLimits, [identity]: limit };
    return this.rateLimit({ providerLimits });
  }

  disableRateLimiting(): this {
    return this.rateLimit({ enabled: false });
  }

  circuitBreaker(overrides: Partial<CircuitBreakerConfig>): this {
    this.config = { ...this.config, circuitBreaker: { ...this.config.circuitBreaker, ...overrides } };
    return this;
  }

  retry(overrides: Partial<RetryConfig>): this {
    this.config = { ...this.config, retry: { ...this.config.retry, ...overrides } };
    return this;
  }

  fallbackChain(primary: string, chain: FallbackChain): this {
    this.config = {
      ...this.config,
      fallbackChains: { ...this.config.fallbackChains, [primary]: chain },
    };
    return this;
  }

  /** Replaces the whole fallback table */
  fallbackChains(table: FallbackTable): this {
    this.config = { ...this.config, fallbackChains: copyFallbackTable(table) };
    return this;
  }

  defaultEstimatedUnits(units: number): this {
    this.config = { ...this.config, defaultEstimatedUnits: units };
    return this;
  }

  logLevel(level: LogLevel): this {
    this.config = { ...this.config, logLevel: level };
    return this;
  }

  build(): GovernorConfig {
    return validateGovernorConfig(this.config);
  }
}

// ============================================================================
// Environment
// ============================================================================

function trimmed(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const text = value.trim();
  return text === '' ? undefined : text;
}

function lowered(value: unknown): unknown {
  const text = trimmed(value);
  return typeof text === 'string' ? text.toLowerCase() : text;
}

const envNumber = (schema: z.ZodNumber) => z.preprocess(trimmed, z.coerce.number().pipe(schema).optional());

const envFlag = z.preprocess(
  lowered,
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])
    .transform(flag => flag === 'true' || flag === '1' || flag === 'yes' || flag === 'on')
    .optional()
);

const envProviderLimits = z.preprocess(
  trimmed,
  z
    .string()
    .transform((raw, ctx) => {
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `not valid JSON (${error instanceof Error ? error.message : String(error)})`,
        });
        return z.NEVER;
      }
    })
    .pipe(z.record(z.string(), ProviderLimitOverrideSchema))
    .optional()
);

const envLogLevel = z.preprocess(
  trimmed,
  z
    .string()
    .transform((raw, ctx) => {
      const level = parseLogLevel(raw);
      if (level === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown log level "${raw}"` });
        return z.NEVER;
      }
      return level;
    })
    .optional()
);

const EnvironmentSchema = z.object({
  GOVERNOR_RATE_LIMIT_ENABLED: envFlag,
  GOVERNOR_REQUESTS_PER_MINUTE: envNumber(z.number().positive()),
  GOVERNOR_TOKENS_PER_MINUTE: envNumber(z.number().positive()),
  GOVERNOR_PROVIDER_LIMITS: envProviderLimits,
  GOVERNOR_CIRCUIT_THRESHOLD: envNumber(z.number().int().positive()),
  GOVERNOR_CIRCUIT_COOLDOWN_SECONDS: envNumber(z.number().positive()),
  GOVERNOR_CIRCUIT_RECOVERY: z.preprocess(lowered, z.enum(['reset', 'single-probe']).optional()),
  GOVERNOR_RETRY_MAX_ATTEMPTS: envNumber(z.number().int().min(1)),
  GOVERNOR_RETRY_MIN_DELAY_MS: envNumber(z.number().min(0)),
  GOVERNOR_RETRY_MAX_DELAY_MS: envNumber(z.number().min(0)),
  GOVERNOR_LOG_LEVEL: envLogLevel,
});

/**
 * Loads configuration from `GOVERNOR_*` environment variables on top of
 * `base`. Blank variables count as unset. `GOVERNOR_PROVIDER_LIMITS` is a
 * JSON object merged over the base provider limits.
 *
 * @throws {ConfigurationError} If a variable cannot be parsed or the result is invalid
 */
export function configFromEnvironment(
  env: Environment = process.env,
  base: GovernorConfig = createDefaultGovernorConfig()
): GovernorConfig {
  const result = EnvironmentSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError('Invalid governor environment', formatIssues(result.error));
  }
  const vars = result.data;

  return validateGovernorConfig({
    ...base,
    rateLimit: {
      enabled: vars.GOVERNOR_RATE_LIMIT_ENABLED ?? base.rateLimit.enabled,
      requestsPerMinute: vars.GOVERNOR_REQUESTS_PER_MINUTE ?? base.rateLimit.requestsPerMinute,
      tokensPerMinute: vars.GOVERNOR_TOKENS_PER_MINUTE ?? base.rateLimit.tokensPerMinute,
      providerLimits: { ...base.rateLimit.providerLimits, ...vars.GOVERNOR_PROVIDER_LIMITS },
    },
    circuitBreaker: {
      failureThreshold: vars.GOVERNOR_CIRCUIT_THRESHOLD ?? base.circuitBreaker.failureThreshold,
      cooldownSeconds: vars.GOVERNOR_CIRCUIT_COOLDOWN_SECONDS ?? base.circuitBreaker.cooldownSeconds,
      recoveryMode: vars.GOVERNOR_CIRCUIT_RECOVERY ?? base.circuitBreaker.recoveryMode,
    },
    retry: {
      ...base.retry,
      maxAttempts: vars.GOVERNOR_RETRY_MAX_ATTEMPTS ?? base.retry.maxAttempts,
      minDelayMs: vars.GOVERNOR_RETRY_MIN_DELAY_MS ?? base.retry.minDelayMs,
      maxDelayMs: vars.GOVERNOR_RETRY_MAX_DELAY_MS ?? base.retry.maxDelayMs,
    },
    logLevel: vars.GOVERNOR_LOG_LEVEL ?? base.logLevel,
  });
}
