/**
 * Identity Resolver
 *
 * Maps raw identifiers (link addresses, vantage host ids, local interface
 * names) to canonical interfaces and hosts inside one batch.
 *
 * A vantage host's own card is filed under its interface name until some
 * neighbour reports the link address behind one of its IPs; it is then
 * bound to that addressed interface. Two addressed interfaces never merge.
 * Hosts are clustered: union evidence is folded through a batch-local
 * disjoint-set, then each cluster of persisted roots collapses into its
 * smallest host id, which is what keeps merges independent of ingestion
 * order.
 */

import { StoreCorruptionError } from '../core/errors.js';
import type { HostMerge, HostRecord, InterfaceRecord, IpConflict } from '../model/graph.js';
import { hostIdFor, interfaceIdFor } from '../model/ids.js';
import { addSorted, findValue, mergeValues, noteValue, unionSorted } from '../model/provenance.js';
import type { WorkingSet } from '../store/working-set.js';
import { DisjointSet, compareStrings } from './disjoint-set.js';

export interface Evidence {
  observationId: string;
  observedAt: number;
}

interface UnionRequest {
  a: string;
  b: string;
  observationIds: string[];
}

/** A name-keyed interface folded into the addressed interface holding its IP. */
export interface InterfaceBinding {
  interfaceId: string;
  into: string;
}

/** Longest `mergedInto` chain followed before the store is declared corrupt. */
const MAX_MERGE_HOPS = 64;

// ═══════════════════════════════════════════════════════════════
// OWNERSHIP
// ═══════════════════════════════════════════════════════════════

/**
 * Current owner of an IP among its claimants: the latest claim wins, ties
 * go to the smaller interface id.
 */
export function pickOwner(claimants: readonly InterfaceRecord[], ip: string): InterfaceRecord | undefined {
  let best: { record: InterfaceRecord; lastSeen: number } | undefined;
  for (const record of claimants) {
    const claim = findValue(record.addresses, ip);
    if (!claim) continue;
    if (
      !best ||
      claim.lastSeen > best.lastSeen ||
      (claim.lastSeen === best.lastSeen && record.id < best.record.id)
    ) {
      best = { record, lastSeen: claim.lastSeen };
    }
  }
  return best?.record;
}

/**
 * Conflict annotation for `ip`: two or more link addresses claim it from
 * different hosts. Name-keyed claimants carry no link address and never
 * take part.
 */
export function conflictFor(claimants: readonly InterfaceRecord[], ip: string): IpConflict | null {
  const addressed = claimants.filter(record => record.linkAddress !== null && record.mergedInto === null);
  const hosts = new Set(addressed.map(record => record.hostId));
  if (hosts.size < 2) return null;

  let observationIds: string[] = [];
  for (const record of addressed) {
    const claim = findValue(record.addresses, ip);
    if (claim) observationIds = unionSorted(observationIds, claim.observationIds);
  }
  return {
    ip,
    interfaceIds: addressed.map(record => record.id).sort(),
    observationIds,
  };
}

function sameConflict(a: IpConflict | undefined, b: IpConflict): boolean {
  return (
    a !== undefined &&
    a.interfaceIds.join(',') === b.interfaceIds.join(',') &&
    a.observationIds.join(',') === b.observationIds.join(',')
  );
}

/** What an absorbed host leaves behind. */
export function hostRedirect(host: HostRecord, into: string): HostRecord {
  return {
    ...host,
    interfaceIds: [],
    labels: [],
    firstSeen: 0,
    lastSeen: 0,
    provenance: [],
    mergedFrom: [],
    mergedInto: into,
  };
}

/** What a bound interface leaves behind, filed under its seed host. */
export function interfaceRedirect(record: InterfaceRecord, into: string): InterfaceRecord {
  return {
    ...record,
    hostId: hostIdFor(record.seed),
    names: [],
    addresses: [],
    conflicts: [],
    firstSeen: 0,
    lastSeen: 0,
    provenance: [],
    mergedFrom: [],
    mergedInto: into,
  };
}

function claimIdsOn(record: InterfaceRecord, ips: ReadonlySet<string>): string[] {
  let ids: string[] = [];
  for (const address of record.addresses) {
    if (ips.has(address.value)) ids = unionSorted(ids, address.observationIds);
  }
  return ids;
}

function touch<T extends { firstSeen: number; lastSeen: number; provenance: string[] }>(record: T, evidence: Evidence): T {
  return {
    ...record,
    firstSeen: Math.min(record.firstSeen, evidence.observedAt),
    lastSeen: Math.max(record.lastSeen, evidence.observedAt),
    provenance: addSorted(record.provenance, evidence.observationId),
  };
}

// ═══════════════════════════════════════════════════════════════
// RESOLVER
// ═══════════════════════════════════════════════════════════════

export class IdentityResolver {
  private unions: UnionRequest[] = [];
  private claimed = new Set<string>();
  private mergedSurvivors = new Set<string>();

  constructor(private readonly ws: WorkingSet) {}

  /** Follow `mergedInto` to the live host. */
  async resolveRoot(hostId: string): Promise<string> {
    let current = await this.requireHost(hostId);
    for (let hops = 0; current.mergedInto !== null; hops++) {
      if (hops >= MAX_MERGE_HOPS) {
        throw new StoreCorruptionError(`Merge chain from ${hostId} does not terminate`);
      }
      current = await this.requireHost(current.mergedInto);
    }
    return current.id;
  }

  /**
   * Live host for a seed, created on first sight. Evidence and the optional
   * label land on the root, never on an absorbed record.
   */
  async ensureHost(seed: string, evidence: Evidence, label?: string): Promise<HostRecord> {
    const id = hostIdFor(seed);
    const existing = await this.ws.get('hosts', id);

    if (!existing) {
      const created: HostRecord = {
        id,
        seed,
        interfaceIds: [],
        labels: label ? noteValue([], label, evidence.observationId, evidence.observedAt) : [],
        firstSeen: evidence.observedAt,
        lastSeen: evidence.observedAt,
        provenance: [evidence.observationId],
        mergedFrom: [],
        mergedInto: null,
      };
      this.ws.create('hosts', created);
      return created;
    }

    const root = await this.requireHost(await this.resolveRoot(id));
    const updated = touch(root, evidence);
    if (label) {
      updated.labels = noteValue(updated.labels, label, evidence.observationId, evidence.observedAt);
    }
    this.ws.set('hosts', updated);
    return updated;
  }

  /** Follow a bound interface to the one it was folded into. */
  async resolveInterface(interfaceId: string): Promise<InterfaceRecord> {
    const record = await this.requireInterface(interfaceId);
    if (record.mergedInto === null) return record;

    const target = await this.requireInterface(record.mergedInto);
    if (target.mergedInto !== null) {
      throw new StoreCorruptionError(`Interface ${interfaceId} redirects to a bound interface`);
    }
    return target;
  }

  /**
   * Live interface for an identity key, created inside the seed host's live
   * root on first sight. An existing interface and its host are touched; a
   * bound one hands the evidence to the interface it was folded into.
   */
  async ensureInterface(key: string, linkAddress: string | null, seed: string, evidence: Evidence): Promise<InterfaceRecord> {
    const id = interfaceIdFor(key);
    const existing = await this.ws.get('interfaces', id);

    if (existing) {
      const updated = touch(await this.resolveInterface(id), evidence);
      this.ws.set('interfaces', updated);
      const host = await this.requireHost(await this.resolveRoot(updated.hostId));
      this.ws.set('hosts', touch(host, evidence));
      return updated;
    }

    const host = await this.ensureHost(seed, evidence);
    const created: InterfaceRecord = {
      id,
      key,
      seed,
      hostId: host.id,
      linkAddress,
      names: [],
      addresses: [],
      conflicts: [],
      firstSeen: evidence.observedAt,
      lastSeen: evidence.observedAt,
      provenance: [evidence.observationId],
      mergedFrom: [],
      mergedInto: null,
    };
    this.ws.create('interfaces', created);
    this.ws.set('hosts', { ...host, interfaceIds: addSorted(host.interfaceIds, id) });
    return created;
  }

  /** Record that `interfaceId` was seen holding `ip`. */
  async claimIp(interfaceId: string, ip: string, evidence: Evidence): Promise<void> {
    const record = await this.requireInterface(interfaceId);
    this.ws.set('interfaces', {
      ...record,
      addresses: noteValue(record.addresses, ip, evidence.observationId, evidence.observedAt),
    });
    this.claimed.add(ip);
  }

  async noteName(interfaceId: string, name: string, evidence: Evidence): Promise<void> {
    const record = await this.requireInterface(interfaceId);
    this.ws.set('interfaces', {
      ...record,
      names: noteValue(record.names, name, evidence.observationId, evidence.observedAt),
    });
  }

  /** Queue evidence that two hosts are one machine; applied by `applyUnions`. */
  requestUnion(a: string, b: string, observationIds: string[]): void {
    if (a !== b) this.unions.push({ a, b, observationIds });
  }

  /** IPs claimed by this batch, or moved to another interface by a binding. */
  claimedIps(): string[] {
    return [...this.claimed].sort();
  }

  /**
   * Bind every live name-keyed interface that shares an IP with exactly one
   * addressed interface. Runs to a fixpoint: a binding hands the bound
   * interface's IPs to its target, which may settle further interfaces.
   * The hosts of both sides are queued for union.
   */
  async bindInterfaces(): Promise<InterfaceBinding[]> {
    const bindings: InterfaceBinding[] = [];
    const pending = [...this.claimed].sort();
    const queued = new Set(pending);

    let ip: string | undefined;
    while ((ip = pending.shift()) !== undefined) {
      for (const claimant of await this.ws.interfacesByIp(ip)) {
        if (claimant.linkAddress !== null || claimant.mergedInto !== null) continue;

        const target = await this.bindingTarget(claimant);
        if (!target) continue;

        await this.bind(claimant, target);
        bindings.push({ interfaceId: claimant.id, into: target.id });
        for (const address of claimant.addresses) {
          if (queued.has(address.value)) continue;
          queued.add(address.value);
          pending.push(address.value);
        }
      }
    }

    return bindings.sort((x, y) => compareStrings(x.interfaceId, y.interfaceId));
  }

  /**
   * Fold queued union evidence and merge every resulting cluster into its
   * smallest host id.
   */
  async applyUnions(): Promise<HostMerge[]> {
    if (this.unions.length === 0) return [];

    const clusters = new DisjointSet<string>(compareStrings);
    const resolved: UnionRequest[] = [];
    for (const request of this.unions) {
      const a = await this.resolveRoot(request.a);
      const b = await this.resolveRoot(request.b);
      if (a === b) continue;
      clusters.union(a, b);
      resolved.push({ a, b, observationIds: request.observationIds });
    }
    this.unions = [];

    const evidence = new Map<string, string[]>();
    for (const { a, observationIds } of resolved) {
      const label = clusters.find(a);
      evidence.set(label, unionSorted(evidence.get(label) ?? [], observationIds));
    }

    const merges: HostMerge[] = [];
    for (const [survivorId, members] of clusters.groups()) {
      const absorbedIds = members.filter(id => id !== survivorId);
      merges.push(await this.mergeHosts(survivorId, absorbedIds, evidence.get(survivorId) ?? []));
    }
    return merges.sort((x, y) => compareStrings(x.survivorId, y.survivorId));
  }

  /**
   * Recompute conflict annotations for the given IPs on every claimant.
   * Returns the conflicts that are new or changed.
   */
  async refreshConflicts(ips: Iterable<string>): Promise<IpConflict[]> {
    const raised: IpConflict[] = [];

    for (const ip of [...new Set(ips)].sort()) {
      const claimants = await this.ws.interfacesByIp(ip);
      const conflict = conflictFor(claimants, ip);
      let changed = false;

      for (const record of claimants) {
        const previous = record.conflicts.find(entry => entry.ip === ip);
        const others = record.conflicts.filter(entry => entry.ip !== ip);
        if (conflict === null || !conflict.interfaceIds.includes(record.id)) {
          if (previous) this.ws.set('interfaces', { ...record, conflicts: others });
          continue;
        }
        if (sameConflict(previous, conflict)) continue;
        changed = true;
        this.ws.set('interfaces', {
          ...record,
          conflicts: [...others, conflict].sort((x, y) => compareStrings(x.ip, y.ip)),
        });
      }

      if (conflict && changed) raised.push(conflict);
    }
    return raised;
  }

  /** IPs whose conflict state may have moved: claimed here, or held by a merged host. */
  async affectedIps(): Promise<string[]> {
    const ips = new Set(this.claimed);
    for (const hostId of this.mergedSurvivors) {
      const host = await this.requireHost(hostId);
      for (const interfaceId of host.interfaceIds) {
        const record = await this.requireInterface(interfaceId);
        for (const address of record.addresses) ips.add(address.value);
      }
    }
    return [...ips].sort();
  }

  async currentOwner(ip: string): Promise<InterfaceRecord | undefined> {
    return pickOwner(await this.ws.interfacesByIp(ip), ip);
  }

  // ─── Binding ───────────────────────────────────────────────

  /** The one addressed interface claiming any IP of `record`, if there is exactly one. */
  private async bindingTarget(record: InterfaceRecord): Promise<InterfaceRecord | undefined> {
    const candidates = new Map<string, InterfaceRecord>();
    for (const address of record.addresses) {
      for (const claimant of await this.ws.interfacesByIp(address.value)) {
        if (claimant.linkAddress !== null) candidates.set(claimant.id, claimant);
      }
    }
    if (candidates.size !== 1) return undefined;

    const [target] = candidates.values();
    // A card that lists its own link address as a neighbour stays apart.
    const links = await this.ws.linksByEndpoint(record.id);
    const adjacent = links.some(link => link.kind === 'adjacency' && link.endpoints.includes(target.id));
    return adjacent ? undefined : target;
  }

  private async bind(record: InterfaceRecord, target: InterfaceRecord): Promise<void> {
    const ips = new Set(record.addresses.map(address => address.value));
    const shared = unionSorted(claimIdsOn(record, ips), claimIdsOn(target, ips));

    this.ws.set('interfaces', {
      ...target,
      names: mergeValues(target.names, record.names),
      addresses: mergeValues(target.addresses, record.addresses),
      firstSeen: Math.min(target.firstSeen, record.firstSeen),
      lastSeen: Math.max(target.lastSeen, record.lastSeen),
      provenance: unionSorted(target.provenance, record.provenance),
      mergedFrom: addSorted(target.mergedFrom, record.id),
    });
    this.ws.set('interfaces', interfaceRedirect(record, target.id));

    const host = await this.requireHost(await this.resolveRoot(record.hostId));
    this.ws.set('hosts', { ...host, interfaceIds: host.interfaceIds.filter(id => id !== record.id) });
    this.requestUnion(host.id, target.hostId, shared);

    for (const ip of ips) this.claimed.add(ip);
  }

  // ─── Merging ───────────────────────────────────────────────

  private async mergeHosts(survivorId: string, absorbedIds: string[], observationIds: string[]): Promise<HostMerge> {
    let survivor = await this.requireHost(survivorId);

    for (const absorbedId of absorbedIds) {
      const absorbed = await this.requireHost(absorbedId);

      for (const interfaceId of absorbed.interfaceIds) {
        const record = await this.requireInterface(interfaceId);
        this.ws.set('interfaces', { ...record, hostId: survivorId });
      }

      // Keep every absorbed record one hop away from the live root.
      for (const stubId of absorbed.mergedFrom) {
        const stub = await this.requireHost(stubId);
        this.ws.set('hosts', hostRedirect(stub, survivorId));
      }

      survivor = {
        ...survivor,
        interfaceIds: unionSorted(survivor.interfaceIds, absorbed.interfaceIds),
        labels: mergeValues(survivor.labels, absorbed.labels),
        firstSeen: Math.min(survivor.firstSeen, absorbed.firstSeen),
        lastSeen: Math.max(survivor.lastSeen, absorbed.lastSeen),
        provenance: unionSorted(survivor.provenance, absorbed.provenance),
        mergedFrom: unionSorted(survivor.mergedFrom, [absorbed.id, ...absorbed.mergedFrom]),
      };

      this.ws.set('hosts', hostRedirect(absorbed, survivorId));
    }

    survivor = { ...survivor, provenance: unionSorted(survivor.provenance, observationIds) };
    this.ws.set('hosts', survivor);
    this.mergedSurvivors.add(survivorId);

    return { survivorId, absorbedIds: [...absorbedIds].sort(), observationIds };
  }

  private async requireHost(id: string): Promise<HostRecord> {
    const record = await this.ws.get('hosts', id);
    if (!record) throw new StoreCorruptionError(`Dangling host reference: ${id}`);
    return record;
  }

  private async requireInterface(id: string): Promise<InterfaceRecord> {
    const record = await this.ws.get('interfaces', id);
    if (!record) throw new StoreCorruptionError(`Dangling interface reference: ${id}`);
    return record;
  }
}
