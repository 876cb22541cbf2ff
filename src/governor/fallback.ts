/**
 * Static fallback routing.
 *
 * @module governor/fallback
 */

import type { UpstreamTarget } from '../types/index.js';

/**
 * Ordered alternates for one primary identity.
 */
export type FallbackChain = readonly UpstreamTarget[];

/**
 * Primary identity to its ordered alternates. Never mutated at runtime.
 */
export type FallbackTable = Readonly<Record<string, FallbackChain>>;

/**
 * A target in the routing order of one request.
 */
export interface RoutedTarget extends UpstreamTarget {
  readonly usedFallback: boolean;
}

/**
 * Looks up the chain configured for `identity`.
 */
export function resolveFallbackChain(table: FallbackTable, identity: string): FallbackChain {
  return Object.prototype.hasOwnProperty.call(table, identity) ? table[identity] ?? [] : [];
}

/**
 * Primary first, then alternates in order. Alternates naming the same
 * identity and endpoint as an earlier target are dropped.
 */
export function buildRoutingOrder(primary: UpstreamTarget, chain: FallbackChain): RoutedTarget[] {
  const order: RoutedTarget[] = [{ ...primary, usedFallback: false }];
  const seen = new Set([targetKey(primary)]);

  for (const alternate of chain) {
    const key = targetKey(alternate);
    if (seen.has(key)) continue;
    seen.add(key);
    order.push({ identity: alternate.identity, endpoint: alternate.endpoint, usedFallback: true });
  }

  return order;
}

/**
 * Problems with a fallback table, as human-readable strings.
 */
export function findFallbackTableIssues(table: FallbackTable): string[] {
  const issues: string[] = [];
  for (const [primary, chain] of Object.entries(table)) {
    chain.forEach((entry, index) => {
      if (entry.identity.trim() === '' || entry.endpoint.trim() === '') {
        issues.push(`fallbackChains.${primary}[${index}] must name an identity and an endpoint`);
      }
      if (entry.identity === primary) {
        issues.push(`fallbackChains.${primary}[${index}] routes back to its own primary`);
      }
    });
  }
  return issues;
}

function targetKey(target: UpstreamTarget): string {
  return `${target.identity}\u0000${target.endpoint}`;
}
