import type { LinkKind, LinkRecord, LinkStatus } from '../model/graph.js';
import type { TopologyConfig } from '../core/types.js';

export type ConfidencePolicy = Pick<TopologyConfig, 'adjacencyBase' | 'routeBase' | 'trustedSources' | 'stalenessWindowMs'>;

/**
 * Independent confidence track per link kind: each distinct supporting
 * observation closes a fixed share of the remaining gap to 1. Adjacency and
 * route scores are not comparable with each other.
 */
export function confidenceFor(kind: LinkKind, supporting: number, policy: ConfidencePolicy): number {
  if (supporting <= 0) return 0;
  const base = kind === 'adjacency' ? policy.adjacencyBase : policy.routeBase;
  return 1 - Math.pow(1 - base, supporting);
}

/** Status implied by the evidence alone, ignoring age. */
export function evidenceStatus(supporting: number, sources: readonly string[], policy: ConfidencePolicy): LinkStatus {
  if (supporting >= 2) return 'confirmed';
  return sources.some(source => policy.trustedSources.includes(source)) ? 'confirmed' : 'proposed';
}

export function isStale(link: Pick<LinkRecord, 'lastSeen'>, asOf: number, policy: ConfidencePolicy): boolean {
  return asOf - link.lastSeen > policy.stalenessWindowMs;
}

/** Status as seen by a query at `asOf`: the persisted one, aged lazily. */
export function effectiveStatus(link: LinkRecord, asOf: number, policy: ConfidencePolicy): LinkStatus {
  if (link.status === 'stale') return 'stale';
  return isStale(link, asOf, policy) ? 'stale' : link.status;
}
