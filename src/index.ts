/**
 * Upstream governor.
 *
 * In-process admission control and resilience for calls to rate-limited,
 * unreliable upstreams: hosted LLM completion APIs and pooled database
 * connections.
 *
 * @example
 * ```typescript
 * import { ResilienceGovernor, configFromEnvironment, createChatCompletionCall } from 'upstream-governor';
 *
 * const governor = new ResilienceGovernor({ config: configFromEnvironment() });
 * const result = await governor.execute(
 *   'groq',
 *   createChatCompletionCall({ messages: [{ role: 'user', content: 'List slow queries' }] })
 * );
 * ```
 *
 * @packageDocumentation
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './observability/index.js';
export * from './config/index.js';
export * from './rate-limit/index.js';
export * from './resilience/index.js';
export * from './governor/index.js';
export * from './providers/index.js';
export * from './connectors/index.js';
