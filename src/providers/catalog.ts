/**
 * OpenAI-compatible completion providers known to the governor.
 *
 * @module providers/catalog
 */

import type { FallbackTable } from '../governor/fallback.js';
import type { Clock, UpstreamTarget } from '../types/index.js';
import { monotonicClock } from '../types/index.js';

/**
 * Static description of a completion provider.
 */
export interface ProviderDescriptor {
  /** Identity used for rate limiting and routing */
  readonly name: string;
  /** OpenAI-compatible API root; also the circuit breaker key */
  readonly baseUrl: string;
  /** Environment variable holding the API key; absent for local providers */
  readonly credentialEnvVar?: string;
  /** URL that answers 2xx while a keyless local server is up */
  readonly healthCheckUrl?: string;
  readonly defaultModel: string;
}

export const PROVIDER_CATALOG: Readonly<Record<string, ProviderDescriptor>> = Object.freeze({
  openrouter: {
    name: 'openrouter',
    baseUrl: 'https://openrouter.ai/api/v1',
    credentialEnvVar: 'OPENROUTER_API_KEY',
    defaultModel: 'meta-llama/llama-3.1-8b-instruct:free',
  },
  groq: {
    name: 'groq',
    baseUrl: 'https://api.groq.com/openai/v1',
    credentialEnvVar: 'GROQ_API_KEY',
    defaultModel: 'llama-3.1-70b-versatile',
  },
  ollama: {
    name: 'ollama',
    baseUrl: 'http://localhost:11434/v1',
    healthCheckUrl: 'http://localhost:11434/api/tags',
    defaultModel: 'llama3.1',
  },
  openai: {
    name: 'openai',
    baseUrl: 'https://api.openai.com/v1',
    credentialEnvVar: 'OPENAI_API_KEY',
    defaultModel: 'gpt-4o',
  },
  anthropic: {
    name: 'anthropic',
    baseUrl: 'https://api.anthropic.com/v1',
    credentialEnvVar: 'ANTHROPIC_API_KEY',
    defaultModel: 'claude-3-5-sonnet-20241022',
  },
  together: {
    name: 'together',
    baseUrl: 'https://api.together.xyz/v1',
    credentialEnvVar: 'TOGETHER_API_KEY',
    defaultModel: 'meta-llama/Meta-Llama-3.1-70B-Instruct-Turbo',
  },
  deepseek: {
    name: 'deepseek',
    baseUrl: 'https://api.deepseek.com/v1',
    credentialEnvVar: 'DEEPSEEK_API_KEY',
    defaultModel: 'deepseek-chat',
  },
});

export function getProvider(name: string): ProviderDescriptor | undefined {
  return Object.prototype.hasOwnProperty.call(PROVIDER_CATALOG, name) ? PROVIDER_CATALOG[name] : undefined;
}

/**
 * Routing target for a catalog provider.
 * @throws {RangeError} If the provider is not in the catalog
 */
export function providerTarget(name: string): UpstreamTarget {
  const provider = getProvider(name);
  if (!provider) {
    throw new RangeError(`Unknown provider: ${name}`);
  }
  return { identity: provider.name, endpoint: provider.baseUrl };
}

/**
 * Environment lookup used for credentials.
 */
export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Decides whether a target may be attempted at all.
 */
export type AvailabilityCheck = (target: UpstreamTarget) => boolean | Promise<boolean>;

/**
 * API key for a catalog provider, or undefined when unset or blank.
 */
export function resolveApiKey(name: string, env: Environment = process.env): string | undefined {
  const envVar = getProvider(name)?.credentialEnvVar;
  if (!envVar) return undefined;
  const value = env[envVar]?.trim();
  return value ? value : undefined;
}

/**
 * Availability from credentials: catalog providers that need a key are
 * available only when it is set. Keyless and unknown identities pass.
 */
export function createCredentialCheck(env: Environment = process.env): (target: UpstreamTarget) => boolean {
  return (target) => {
    const provider = getProvider(target.identity);
    if (!provider?.credentialEnvVar) {
      return true;
    }
    return resolveApiKey(provider.name, env) !== undefined;
  };
}

export const DEFAULT_HEALTH_CHECK_TIMEOUT_MS = 2000;
export const DEFAULT_HEALTH_CHECK_TTL_MS = 30_000;

export interface AvailabilityCheckOptions {
  env?: Environment;
  /** Timeout of one reachability check */
  timeoutMs?: number;
  /** How long a reachability result is reused */
  cacheTtlMs?: number;
  fetchImpl?: typeof fetch;
  clock?: Clock;
}

interface ReachabilityResult {
  checkedAt: number;
  result: Promise<boolean>;
}

/**
 * Availability from credentials and, for keyless local providers such as
 * ollama, from a GET of `healthCheckUrl`. Results are cached per provider
 * for `cacheTtlMs`; concurrent lookups share one request.
 */
export function createAvailabilityCheck(options: AvailabilityCheckOptions = {}): AvailabilityCheck {
  const {
    env = process.env,
    timeoutMs = DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
    cacheTtlMs = DEFAULT_HEALTH_CHECK_TTL_MS,
    fetchImpl = globalThis.fetch,
    clock = monotonicClock,
  } = options;
  const hasCredentials = createCredentialCheck(env);
  const results = new Map<string, ReachabilityResult>();

  const reach = async (url: string): Promise<boolean> => {
    try {
      const response = await fetchImpl(url, { method: 'GET', signal: AbortSignal.timeout(timeoutMs) });
      return response.ok;
    } catch {
      return false;
    }
  };

  return (target) => {
    const provider = getProvider(target.identity);
    const healthCheckUrl = provider?.healthCheckUrl;
    if (!provider || !healthCheckUrl || provider.credentialEnvVar) {
      return hasCredentials(target);
    }

    const now = clock();
    const cached = results.get(provider.name);
    if (cached && now - cached.checkedAt < cacheTtlMs) {
      return cached.result;
    }
    const result = reach(healthCheckUrl);
    results.set(provider.name, { checkedAt: now, result });
    return result;
  };
}

/**
 * Names of catalog providers whose credentials are present, in catalog order.
 */
export function listAvailableProviders(env: Environment = process.env): string[] {
  const check = createCredentialCheck(env);
  return Object.values(PROVIDER_CATALOG)
    .filter(p => check({ identity: p.name, endpoint: p.baseUrl }))
    .map(p => p.name);
}

function chainOf(...names: string[]): UpstreamTarget[] {
  return names.map(providerTarget);
}

/**
 * Default alternates per provider: hosted free tiers first, the local
 * ollama server last.
 */
export const DEFAULT_FALLBACK_CHAINS: FallbackTable = Object.freeze({
  groq: chainOf('openrouter', 'openai', 'ollama'),
  openrouter: chainOf('groq', 'openai', 'ollama'),
  openai: chainOf('openrouter', 'groq', 'ollama'),
  anthropic: chainOf('openrouter', 'openai', 'groq'),
  deepseek: chainOf('openai', 'openrouter'),
  together: chainOf('openrouter', 'groq'),
  ollama: [],
});
