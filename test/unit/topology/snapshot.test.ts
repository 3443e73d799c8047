import { describe, it, expect } from 'vitest';
import { buildSnapshot, placeholdersFor } from '../../../src/topology/snapshot.js';
import type { ConfidencePolicy } from '../../../src/topology/confidence.js';
import type { GraphCollections, HostRecord, LinkRecord, RouteLink } from '../../../src/model/graph.js';

const policy: ConfidencePolicy = { adjacencyBase: 0.5, routeBase: 0.3, trustedSources: [], stalenessWindowMs: 100 };

function host(id: string, mergedInto: string | null): HostRecord {
  return { id, seed: id, interfaceIds: [], labels: [], firstSeen: 0, lastSeen: 0, provenance: [], mergedFrom: [], mergedInto };
}

function routeLink(id: string, gatewayIp: string | null, destination: string, to: string | null = null): RouteLink {
  return {
    id,
    kind: 'route',
    from: 'if-a',
    to,
    gatewayIp,
    destination,
    metric: 0,
    metricObservedAt: 0,
    confidence: 0.3,
    status: 'proposed',
    sources: ['r1'],
    firstSeen: 0,
    lastSeen: 1000,
    provenance: ['obs-1'],
    mergedFrom: [],
    mergedInto: null,
  };
}

describe('placeholdersFor', () => {
  it('should group unresolved routes by gateway', () => {
    const links: LinkRecord[] = [
      routeLink('link-3', '10.0.0.9', '10.2.0.0/16'),
      routeLink('link-1', '10.0.0.9', '10.1.0.0/16'),
      routeLink('link-2', '10.0.0.1', '10.3.0.0/16'),
      routeLink('link-4', '10.0.0.7', '10.4.0.0/16', 'if-b'),
      routeLink('link-5', null, '10.5.0.0/16'),
    ];

    expect(placeholdersFor(links)).toEqual([
      { id: 'unresolved:10.0.0.1', gatewayIp: '10.0.0.1', destinations: ['10.3.0.0/16'], linkIds: ['link-2'] },
      { id: 'unresolved:10.0.0.9', gatewayIp: '10.0.0.9', destinations: ['10.1.0.0/16', '10.2.0.0/16'], linkIds: ['link-1', 'link-3'] },
    ]);
  });
});

describe('buildSnapshot', () => {
  const collections: GraphCollections = {
    hosts: [host('host-a', null), host('host-b', 'host-a')],
    interfaces: [],
    links: [
      { ...routeLink('link-old', '10.0.0.9', '10.1.0.0/16'), lastSeen: 0 },
      { ...routeLink('link-new', null, '10.2.0.0/16'), confidence: 0.51 },
    ],
    observations: [],
  };

  it('should list live hosts only and hide stale links', () => {
    const snapshot = buildSnapshot(collections, {}, policy, 150);
    expect(snapshot.takenAt).toBe(150);
    expect(snapshot.hosts.map(h => h.id)).toEqual(['host-a']);
    expect(snapshot.links.map(l => l.id)).toEqual(['link-new']);
    expect(snapshot.placeholders).toEqual([]);
  });

  it('should mark stale links when asked to include them', () => {
    const snapshot = buildSnapshot(collections, { includeStale: true }, policy, 150);
    expect(snapshot.links.map(l => [l.id, l.status])).toEqual([['link-old', 'stale'], ['link-new', 'proposed']]);
    expect(snapshot.placeholders.map(p => p.id)).toEqual(['unresolved:10.0.0.9']);
  });

  it('should leave redirected links out, even as placeholders', () => {
    const snapshot = buildSnapshot(
      { ...collections, links: [...collections.links, { ...routeLink('link-moved', '10.0.0.4', '10.3.0.0/16'), mergedInto: 'link-new' }] },
      { includeStale: true },
      policy,
      150,
    );
    expect(snapshot.links.map(l => l.id)).toEqual(['link-old', 'link-new']);
    expect(snapshot.placeholders.map(p => p.id)).toEqual(['unresolved:10.0.0.9']);
  });

  it('should honour asOf and minConfidence', () => {
    const early = buildSnapshot(collections, { asOf: 50 }, policy, 150);
    expect(early.links.map(l => l.id)).toEqual(['link-old', 'link-new']);

    const confident = buildSnapshot(collections, { asOf: 50, minConfidence: 0.5 }, policy, 150);
    expect(confident.links.map(l => l.id)).toEqual(['link-new']);
  });
});
