import type {
  GraphCollections,
  GraphFilter,
  GraphSnapshot,
  LinkRecord,
  PlaceholderNode,
} from '../model/graph.js';
import { placeholderIdFor } from '../model/ids.js';
import { effectiveStatus } from './confidence.js';
import type { ConfidencePolicy } from './confidence.js';

/**
 * Query view of the stored graph: live records only, link status aged to
 * `asOf`, stale and low-confidence links filtered out, and one placeholder
 * node per gateway IP that no interface is known to hold.
 */
export function buildSnapshot(
  collections: GraphCollections,
  filter: GraphFilter,
  policy: ConfidencePolicy,
  now: number,
): GraphSnapshot {
  const asOf = filter.asOf ?? now;
  const minConfidence = filter.minConfidence ?? 0;

  const links: LinkRecord[] = collections.links
    .filter(link => link.mergedInto === null)
    .map(link => ({ ...link, status: effectiveStatus(link, asOf, policy) }))
    .filter(link => (filter.includeStale || link.status !== 'stale') && link.confidence >= minConfidence);

  return {
    takenAt: now,
    hosts: collections.hosts.filter(host => host.mergedInto === null),
    interfaces: collections.interfaces.filter(record => record.mergedInto === null),
    links,
    placeholders: placeholdersFor(links),
  };
}

export function placeholdersFor(links: readonly LinkRecord[]): PlaceholderNode[] {
  const byGateway = new Map<string, PlaceholderNode>();

  for (const link of links) {
    if (link.kind !== 'route' || link.to !== null || link.gatewayIp === null) continue;

    const node = byGateway.get(link.gatewayIp) ?? {
      id: placeholderIdFor(link.gatewayIp),
      gatewayIp: link.gatewayIp,
      destinations: [],
      linkIds: [],
    };
    if (!node.destinations.includes(link.destination)) node.destinations.push(link.destination);
    node.linkIds.push(link.id);
    byGateway.set(link.gatewayIp, node);
  }

  return [...byGateway.values()]
    .map(node => ({ ...node, destinations: node.destinations.sort(), linkIds: node.linkIds.sort() }))
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}
