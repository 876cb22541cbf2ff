/**
 * Rate limiting module.
 *
 * @module rate-limit
 */

export { TokenBucket } from './token-bucket.js';
export {
  RateLimiter,
  isValidUnits,
  type RateLimiterOptions,
  type RateLimitAdmission,
  type RateLimitRejection,
  type RemainingCapacity,
  type ResolvedLimits,
  type UsageStats,
} from './rate-limiter.js';
