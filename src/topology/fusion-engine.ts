/**
 * Topology Fusion Engine
 *
 * Applies one batch of normalized observations inside a store transaction:
 * dedupes observations, resolves identities, binds name-keyed interfaces,
 * folds host unions, refreshes IP conflicts, upserts links and re-points
 * routes whose gateway owner moved. Every derived field is a set union, a
 * min/max, or a function of those, so replaying the same records in any
 * order lands on the same graph.
 *
 * Links are keyed by the interface ids an observation names. When such an
 * interface has been bound, the evidence goes to the link between the live
 * interfaces and the keyed id is kept as a redirect to it.
 */

import { StoreCorruptionError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type {
  AdjacencyLink,
  HostMerge,
  IpConflict,
  LinkRecord,
  RouteLink,
} from '../model/graph.js';
import {
  adjacencyLinkId,
  hostIdFor,
  interfaceIdFor,
  linkHostSeed,
  linkInterfaceKey,
  localInterfaceKey,
  routeLinkId,
  sourceHostSeed,
} from '../model/ids.js';
import { addSorted, unionSorted } from '../model/provenance.js';
import type { AliasEntry, ArpEntry, ObservationRecord, RouteEntry } from '../model/records.js';
import { IdentityResolver } from '../identity/resolver.js';
import type { Evidence, InterfaceBinding } from '../identity/resolver.js';
import { WorkingSet } from '../store/working-set.js';
import { lockKey } from '../store/types.js';
import type { GraphTransaction } from '../store/types.js';
import { confidenceFor, evidenceStatus } from './confidence.js';
import type { ConfidencePolicy } from './confidence.js';

export interface BatchOutcome {
  fresh: number;
  duplicates: number;
  created: {
    hosts: string[];
    interfaces: string[];
    links: string[];
  };
  conflicts: IpConflict[];
  mergedHosts: HostMerge[];
  reconciledRoutes: string[];
}

// ═══════════════════════════════════════════════════════════════
// LOCK PLANNING
// ═══════════════════════════════════════════════════════════════

function localKeyOf(record: ArpEntry): string {
  return record.localLinkAddress
    ? linkInterfaceKey(record.localLinkAddress)
    : localInterfaceKey(record.sourceHostId, record.localInterface);
}

/**
 * Keys every record is certain to touch. Taking them up front in sorted
 * order keeps most overlapping batches from deadlocking; anything reached
 * later (merge roots, other claimants) is locked on demand.
 */
export function plannedLockKeys(records: readonly ObservationRecord[]): string[] {
  const keys = new Set<string>();

  for (const record of records) {
    keys.add(lockKey('observations', record.id));
    keys.add(lockKey('hosts', hostIdFor(sourceHostSeed(record.sourceHostId))));

    switch (record.kind) {
      case 'arp': {
        const local = interfaceIdFor(localKeyOf(record));
        const neighbor = interfaceIdFor(linkInterfaceKey(record.neighborLinkAddress));
        keys.add(lockKey('interfaces', local));
        keys.add(lockKey('interfaces', neighbor));
        keys.add(lockKey('endpoint', local));
        keys.add(lockKey('endpoint', neighbor));
        keys.add(lockKey('hosts', hostIdFor(linkHostSeed(record.neighborLinkAddress))));
        keys.add(lockKey('ip', record.neighborIp));
        if (record.localLinkAddress) keys.add(lockKey('hosts', hostIdFor(linkHostSeed(record.localLinkAddress))));
        if (record.localIp) keys.add(lockKey('ip', record.localIp));
        if (local !== neighbor) keys.add(lockKey('links', adjacencyLinkId(local, neighbor)));
        break;
      }
      case 'route': {
        const from = interfaceIdFor(localInterfaceKey(record.sourceHostId, record.outgoingInterface));
        keys.add(lockKey('interfaces', from));
        keys.add(lockKey('endpoint', from));
        keys.add(lockKey('links', routeLinkId(from, record.destination, record.gateway)));
        if (record.localIp) keys.add(lockKey('ip', record.localIp));
        if (record.gateway) {
          keys.add(lockKey('gateway', record.gateway));
          keys.add(lockKey('ip', record.gateway));
        }
        break;
      }
      case 'alias':
        if (record.aliasHostId) {
          keys.add(lockKey('hosts', hostIdFor(sourceHostSeed(record.aliasHostId))));
        } else if (record.linkAddress) {
          keys.add(lockKey('interfaces', interfaceIdFor(linkInterfaceKey(record.linkAddress))));
          keys.add(lockKey('hosts', hostIdFor(linkHostSeed(record.linkAddress))));
        }
        break;
    }
  }

  return [...keys].sort();
}

// ═══════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════

export class FusionEngine {
  constructor(private readonly policy: ConfidencePolicy) {}

  async applyBatch(tx: GraphTransaction, records: readonly ObservationRecord[]): Promise<BatchOutcome> {
    const logger = getLogger();
    await tx.lock(plannedLockKeys(records));

    const ws = new WorkingSet(tx);
    const resolver = new IdentityResolver(ws);

    // Observation ids are content hashes: a stored id means a replay.
    const fresh: ObservationRecord[] = [];
    let duplicates = 0;
    for (const record of records) {
      tx.checkpoint();
      if (await ws.get('observations', record.id)) {
        duplicates++;
        continue;
      }
      ws.create('observations', record);
      fresh.push(record);
    }

    const gateways = new Set<string>();
    for (const record of fresh) {
      tx.checkpoint();
      switch (record.kind) {
        case 'arp':
          await this.applyArp(ws, resolver, record);
          break;
        case 'route':
          await this.applyRoute(ws, resolver, record);
          if (record.gateway) gateways.add(record.gateway);
          break;
        case 'alias':
          await this.applyAlias(resolver, record);
          break;
      }
    }

    tx.checkpoint();
    const bindings = await resolver.bindInterfaces();
    for (const binding of bindings) {
      for (const gateway of await this.migrateLinks(ws, binding)) gateways.add(gateway);
    }
    if (bindings.length > 0) {
      logger.debug({ owner: tx.owner, bindings }, 'Interfaces bound to link addresses');
    }

    tx.checkpoint();
    const mergedHosts = await resolver.applyUnions();
    const conflicts = await resolver.refreshConflicts(await resolver.affectedIps());
    const reconciledRoutes = await this.reconcileRoutes(ws, resolver, [...resolver.claimedIps(), ...gateways]);

    tx.checkpoint();
    const written = await ws.flush();

    logger.debug(
      { owner: tx.owner, fresh: fresh.length, duplicates, written, merges: mergedHosts.length, conflicts: conflicts.length },
      'Batch fused',
    );

    return {
      fresh: fresh.length,
      duplicates,
      created: {
        hosts: ws.createdIds('hosts'),
        interfaces: ws.createdIds('interfaces'),
        links: ws.createdIds('links'),
      },
      conflicts,
      mergedHosts,
      reconciledRoutes,
    };
  }

  // ─── Per-kind rules ────────────────────────────────────────

  private async applyArp(ws: WorkingSet, resolver: IdentityResolver, record: ArpEntry): Promise<void> {
    const evidence = evidenceOf(record);
    const sourceSeed = sourceHostSeed(record.sourceHostId);
    const source = await resolver.ensureHost(sourceSeed, evidence, record.sourceHostId);

    const localKey = localKeyOf(record);
    const local = record.localLinkAddress
      ? await resolver.ensureInterface(localKey, record.localLinkAddress, linkHostSeed(record.localLinkAddress), evidence)
      : await resolver.ensureInterface(localKey, null, sourceSeed, evidence);
    await resolver.noteName(local.id, record.localInterface, evidence);
    if (record.localLinkAddress) resolver.requestUnion(local.hostId, source.id, [record.id]);
    if (record.localIp) await resolver.claimIp(local.id, record.localIp, evidence);

    const neighbor = await resolver.ensureInterface(
      linkInterfaceKey(record.neighborLinkAddress),
      record.neighborLinkAddress,
      linkHostSeed(record.neighborLinkAddress),
      evidence,
    );
    await resolver.claimIp(neighbor.id, record.neighborIp, evidence);

    if (neighbor.id !== local.id) {
      await this.upsertAdjacency(ws, interfaceIdFor(localKey), local.id, neighbor.id, record);
    }
  }

  private async applyRoute(ws: WorkingSet, resolver: IdentityResolver, record: RouteEntry): Promise<void> {
    const evidence = evidenceOf(record);
    const sourceSeed = sourceHostSeed(record.sourceHostId);
    await resolver.ensureHost(sourceSeed, evidence, record.sourceHostId);

    const fromKey = localInterfaceKey(record.sourceHostId, record.outgoingInterface);
    const from = await resolver.ensureInterface(fromKey, null, sourceSeed, evidence);
    await resolver.noteName(from.id, record.outgoingInterface, evidence);
    if (record.localIp) await resolver.claimIp(from.id, record.localIp, evidence);
    await this.upsertRoute(ws, interfaceIdFor(fromKey), from.id, record);
  }

  private async applyAlias(resolver: IdentityResolver, record: AliasEntry): Promise<void> {
    const evidence = evidenceOf(record);
    const source = await resolver.ensureHost(sourceHostSeed(record.sourceHostId), evidence, record.sourceHostId);

    if (record.aliasHostId) {
      const target = await resolver.ensureHost(sourceHostSeed(record.aliasHostId), evidence, record.aliasHostId);
      resolver.requestUnion(source.id, target.id, [record.id]);
    } else if (record.linkAddress) {
      const nic = await resolver.ensureInterface(
        linkInterfaceKey(record.linkAddress),
        record.linkAddress,
        linkHostSeed(record.linkAddress),
        evidence,
      );
      if (record.localInterface) await resolver.noteName(nic.id, record.localInterface, evidence);
      resolver.requestUnion(nic.hostId, source.id, [record.id]);
    }
  }

  // ─── Links ─────────────────────────────────────────────────

  /** `keyedLocal` is the id the observation names, `local` the live interface behind it. */
  private async upsertAdjacency(ws: WorkingSet, keyedLocal: string, local: string, neighbor: string, record: ArpEntry): Promise<void> {
    const id = adjacencyLinkId(local, neighbor);
    const existing = await ws.get('links', id);

    if (!existing) {
      const created: AdjacencyLink = {
        id,
        kind: 'adjacency',
        endpoints: sortedPair(local, neighbor),
        ...this.scored('adjacency', [record.id], [record.sourceHostId]),
        firstSeen: record.observedAt,
        lastSeen: record.observedAt,
        mergedFrom: [],
        mergedInto: null,
      };
      ws.create('links', created);
    } else if (existing.kind !== 'adjacency') {
      throw new StoreCorruptionError(`Link ${id} is not an adjacency`);
    } else {
      ws.set('links', this.corroborate(existing, record));
    }

    if (keyedLocal !== local) {
      const keyed = await ws.get('links', id);
      if (keyed) await this.redirectKeyedLink(ws, { ...keyed, id: adjacencyLinkId(keyedLocal, neighbor), endpoints: sortedPair(keyedLocal, neighbor) }, id);
    }
  }

  private async upsertRoute(ws: WorkingSet, keyedFrom: string, from: string, record: RouteEntry): Promise<void> {
    const id = routeLinkId(from, record.destination, record.gateway);
    const existing = await ws.get('links', id);

    if (!existing) {
      const created: RouteLink = {
        id,
        kind: 'route',
        from,
        to: null,
        gatewayIp: record.gateway,
        destination: record.destination,
        metric: record.metric,
        metricObservedAt: record.observedAt,
        ...this.scored('route', [record.id], [record.sourceHostId]),
        firstSeen: record.observedAt,
        lastSeen: record.observedAt,
        mergedFrom: [],
        mergedInto: null,
      };
      ws.create('links', created);
    } else if (existing.kind !== 'route') {
      throw new StoreCorruptionError(`Link ${id} is not a route`);
    } else {
      const updated = this.corroborate(existing, record);
      ws.set('links', latestMetric(updated, record.metric, record.observedAt));
    }

    if (keyedFrom !== from) {
      const keyed = await ws.get('links', id);
      if (keyed) await this.redirectKeyedLink(ws, { ...keyed, id: routeLinkId(keyedFrom, record.destination, record.gateway), from: keyedFrom }, id);
    }
  }

  /** Make sure the id an observation names redirects to the live link. */
  private async redirectKeyedLink(ws: WorkingSet, keyed: LinkRecord, into: string): Promise<void> {
    const stored = await ws.get('links', keyed.id);
    if (stored && stored.mergedInto !== into) {
      throw new StoreCorruptionError(`Link ${keyed.id} is live although its endpoint was bound`);
    }
    if (!stored) ws.set('links', linkRedirect(keyed, into));

    const live = await this.requireLink(ws, into);
    ws.set('links', { ...live, mergedFrom: addSorted(live.mergedFrom, keyed.id) });
  }

  /**
   * Re-key every live link anchored on a bound interface onto the interface
   * it was bound to. Returns the gateways of the moved routes.
   */
  private async migrateLinks(ws: WorkingSet, binding: InterfaceBinding): Promise<string[]> {
    const gateways: string[] = [];

    for (const link of await ws.linksByEndpoint(binding.interfaceId)) {
      const moved: LinkRecord = link.kind === 'adjacency'
        ? {
            ...link,
            id: adjacencyLinkId(...swapEndpoint(link.endpoints, binding)),
            endpoints: sortedPair(...swapEndpoint(link.endpoints, binding)),
          }
        : { ...link, id: routeLinkId(binding.into, link.destination, link.gatewayIp), from: binding.into };

      const existing = await ws.get('links', moved.id);
      const absorbed = [link.id, ...link.mergedFrom];
      if (!existing) {
        ws.create('links', { ...moved, mergedFrom: [...absorbed].sort() });
      } else if (existing.kind !== moved.kind) {
        throw new StoreCorruptionError(`Link ${moved.id} is not a ${moved.kind}`);
      } else {
        ws.set('links', { ...this.fold(existing, link), mergedFrom: unionSorted(existing.mergedFrom, absorbed) });
      }

      for (const stubId of link.mergedFrom) {
        ws.set('links', linkRedirect(await this.requireLink(ws, stubId), moved.id));
      }
      ws.set('links', linkRedirect(link, moved.id));
      if (link.kind === 'route' && link.gatewayIp !== null) gateways.push(link.gatewayIp);
    }

    return gateways;
  }

  /** Add one supporting observation and re-derive score and status from the evidence. */
  private corroborate<T extends LinkRecord>(link: T, record: ObservationRecord): T {
    const provenance = addSorted(link.provenance, record.id);
    const sources = addSorted(link.sources, record.sourceHostId);
    return {
      ...link,
      ...this.scored(link.kind, provenance, sources),
      firstSeen: Math.min(link.firstSeen, record.observedAt),
      lastSeen: Math.max(link.lastSeen, record.observedAt),
    };
  }

  /** Fold the evidence of `other` into `link`. */
  private fold(link: LinkRecord, other: LinkRecord): LinkRecord {
    const provenance = unionSorted(link.provenance, other.provenance);
    const sources = unionSorted(link.sources, other.sources);
    const folded: LinkRecord = {
      ...link,
      ...this.scored(link.kind, provenance, sources),
      firstSeen: Math.min(link.firstSeen, other.firstSeen),
      lastSeen: Math.max(link.lastSeen, other.lastSeen),
    };
    if (folded.kind === 'route' && other.kind === 'route') {
      return latestMetric(folded, other.metric, other.metricObservedAt);
    }
    return folded;
  }

  private scored(kind: LinkRecord['kind'], provenance: string[], sources: string[]): Pick<LinkRecord, 'confidence' | 'status' | 'provenance' | 'sources'> {
    return {
      provenance,
      sources,
      confidence: confidenceFor(kind, provenance.length, this.policy),
      status: evidenceStatus(provenance.length, sources, this.policy),
    };
  }

  private async requireLink(ws: WorkingSet, id: string): Promise<LinkRecord> {
    const link = await ws.get('links', id);
    if (!link) throw new StoreCorruptionError(`Dangling link reference: ${id}`);
    return link;
  }

  /**
   * Point every route through each gateway at the gateway's current owner,
   * or at nothing while the owner is unknown.
   */
  private async reconcileRoutes(ws: WorkingSet, resolver: IdentityResolver, gateways: string[]): Promise<string[]> {
    const reconciled: string[] = [];

    for (const ip of [...new Set(gateways)].sort()) {
      const owner = await resolver.currentOwner(ip);
      const target = owner?.id ?? null;

      for (const link of await ws.routesByGateway(ip)) {
        if (link.kind !== 'route' || link.to === target) continue;
        ws.set('links', { ...link, to: target });
        if (!ws.wasCreated('links', link.id)) reconciled.push(link.id);
      }
    }

    return reconciled.sort();
  }
}

function evidenceOf(record: ObservationRecord): Evidence {
  return { observationId: record.id, observedAt: record.observedAt };
}

function sortedPair(a: string, b: string): [string, string] {
  return a < b ? [a, b] : [b, a];
}

function swapEndpoint(endpoints: [string, string], binding: InterfaceBinding): [string, string] {
  const [a, b] = endpoints.map(id => (id === binding.interfaceId ? binding.into : id));
  return [a, b];
}

/** Latest observation carries the metric; equal timestamps keep the lower one. */
function latestMetric(link: RouteLink, metric: number, observedAt: number): RouteLink {
  const newer = observedAt > link.metricObservedAt || (observedAt === link.metricObservedAt && metric < link.metric);
  return newer ? { ...link, metric, metricObservedAt: observedAt } : link;
}

/** What a re-keyed link leaves behind. */
export function linkRedirect(link: LinkRecord, into: string): LinkRecord {
  const redirect = {
    confidence: 0,
    status: 'proposed' as const,
    sources: [],
    firstSeen: 0,
    lastSeen: 0,
    provenance: [],
    mergedFrom: [],
    mergedInto: into,
  };
  return link.kind === 'adjacency'
    ? { ...link, ...redirect }
    : { ...link, ...redirect, to: null, metric: 0, metricObservedAt: 0 };
}
