/**
 * Governor module.
 *
 * @module governor
 */

export {
  ResilienceGovernor,
  resolveTarget,
  type CallContext,
  type ExecuteOptions,
  type GovernorResult,
  type ResilienceGovernorOptions,
  type UpstreamCall,
  type UpstreamResponse,
} from './governor.js';
export {
  buildRoutingOrder,
  findFallbackTableIssues,
  resolveFallbackChain,
  type FallbackChain,
  type FallbackTable,
  type RoutedTarget,
} from './fallback.js';
