/**
 * Completion provider module.
 *
 * @module providers
 */

export {
  DEFAULT_FALLBACK_CHAINS,
  PROVIDER_CATALOG,
  DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
  DEFAULT_HEALTH_CHECK_TTL_MS,
  createAvailabilityCheck,
  createCredentialCheck,
  getProvider,
  listAvailableProviders,
  providerTarget,
  resolveApiKey,
  type AvailabilityCheck,
  type AvailabilityCheckOptions,
  type Environment,
  type ProviderDescriptor,
} from './catalog.js';
export { CHARS_PER_TOKEN, MESSAGE_OVERHEAD_TOKENS, estimateMessageTokens, estimateTokens } from './estimate.js';
export {
  DEFAULT_COMPLETION_TIMEOUT_MS,
  DEFAULT_UPSTREAM_RETRY_AFTER_SECONDS,
  TRANSIENT_HTTP_STATUSES,
  createChatCompletionCall,
  errorForStatus,
  parseRetryAfter,
  type ChatCompletionCallOptions,
  type ChatMessage,
} from './http-upstream.js';
