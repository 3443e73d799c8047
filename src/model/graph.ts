/**
 * Graph entities as persisted in the four store collections.
 *
 * All list-valued fields are kept sorted so that two stores holding the
 * same evidence serialize identically.
 *
 * Hosts, interfaces and links that were folded into another record stay
 * behind as redirects: `mergedInto` names the live record, every evidence
 * list is empty and the timestamps are 0.
 */

import type { NormalizationError, ObservationRecord } from './records.js';

export type LinkKind = 'adjacency' | 'route';
export type LinkStatus = 'proposed' | 'confirmed' | 'stale';

/** A value together with the observations that asserted it. */
export interface ProvenancedValue {
  value: string;
  firstSeen: number;
  lastSeen: number;
  observationIds: string[];
}

/** Several interfaces on different hosts claim the same IP. */
export interface IpConflict {
  ip: string;
  interfaceIds: string[];
  observationIds: string[];
}

export interface InterfaceRecord {
  id: string;
  /** Raw identity key: `mac:<hex>` or `local:<source>:<name>`. */
  key: string;
  /** Seed of the host the interface was first filed under. */
  seed: string;
  hostId: string;
  linkAddress: string | null;
  names: ProvenancedValue[];
  addresses: ProvenancedValue[];
  conflicts: IpConflict[];
  firstSeen: number;
  lastSeen: number;
  provenance: string[];
  /** Name-keyed interfaces bound to this one. */
  mergedFrom: string[];
  /** Interface this one was bound to. */
  mergedInto: string | null;
}

export interface HostRecord {
  id: string;
  /** Raw seed the id was derived from: `src:<sourceHostId>` or `mac:<hex>`. */
  seed: string;
  interfaceIds: string[];
  labels: ProvenancedValue[];
  firstSeen: number;
  lastSeen: number;
  provenance: string[];
  /** Hosts absorbed into this one. */
  mergedFrom: string[];
  /** Surviving host, set once this host has been absorbed. */
  mergedInto: string | null;
}

interface LinkBase {
  id: string;
  confidence: number;
  status: LinkStatus;
  /** Distinct vantage hosts that reported the link. */
  sources: string[];
  firstSeen: number;
  lastSeen: number;
  /** Supporting observation ids. */
  provenance: string[];
  /** Links re-keyed onto this one after an endpoint was bound. */
  mergedFrom: string[];
  mergedInto: string | null;
}

export interface AdjacencyLink extends LinkBase {
  kind: 'adjacency';
  /** Two interface ids, sorted. */
  endpoints: [string, string];
}

export interface RouteLink extends LinkBase {
  kind: 'route';
  from: string;
  /** Interface currently owning `gatewayIp`, null while unresolved or on-link. */
  to: string | null;
  gatewayIp: string | null;
  destination: string;
  metric: number;
  metricObservedAt: number;
}

export type LinkRecord = AdjacencyLink | RouteLink;

/** "destination reachable via an IP nobody is known to hold yet". */
export interface PlaceholderNode {
  id: string;
  gatewayIp: string;
  destinations: string[];
  linkIds: string[];
}

export interface GraphCollections {
  hosts: HostRecord[];
  interfaces: InterfaceRecord[];
  links: LinkRecord[];
  observations: ObservationRecord[];
}

export interface GraphSnapshot {
  takenAt: number;
  hosts: HostRecord[];
  interfaces: InterfaceRecord[];
  links: LinkRecord[];
  placeholders: PlaceholderNode[];
}

export interface GraphFilter {
  includeStale?: boolean;
  minConfidence?: number;
  /** Reference time for the staleness check; defaults to the service clock. */
  asOf?: number;
}

export interface HostMerge {
  survivorId: string;
  absorbedIds: string[];
  observationIds: string[];
}

export interface MergeReport {
  batchId: string;
  sourceHostId: string;
  accepted: number;
  rejected: number;
  duplicates: number;
  errors: NormalizationError[];
  created: {
    hosts: string[];
    interfaces: string[];
    links: string[];
  };
  conflicts: IpConflict[];
  mergedHosts: HostMerge[];
  reconciledRoutes: string[];
  attempts: number;
  dryRun: boolean;
}
