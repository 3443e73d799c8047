import { z } from 'zod';
import type {
  GraphCollections,
  HostRecord,
  InterfaceRecord,
  IpConflict,
  LinkRecord,
  ProvenancedValue,
} from '../model/graph.js';
import type { ObservationRecord } from '../model/records.js';

/**
 * Zod schemas of the persisted collections. Used to validate rows read back
 * from SQLite and graphs handed to `importGraph`.
 */

export const PERSISTED_VERSION = 2;

const ids = z.array(z.string());
const timestamp = z.number().int().min(0);

export const ProvenancedValueSchema: z.ZodType<ProvenancedValue> = z.object({
  value: z.string(),
  firstSeen: timestamp,
  lastSeen: timestamp,
  observationIds: ids,
});

export const IpConflictSchema: z.ZodType<IpConflict> = z.object({
  ip: z.string(),
  interfaceIds: ids,
  observationIds: ids,
});

export const HostRecordSchema: z.ZodType<HostRecord> = z.object({
  id: z.string().startsWith('host-'),
  seed: z.string(),
  interfaceIds: ids,
  labels: z.array(ProvenancedValueSchema),
  firstSeen: timestamp,
  lastSeen: timestamp,
  provenance: ids,
  mergedFrom: ids,
  mergedInto: z.string().nullable(),
});

export const InterfaceRecordSchema: z.ZodType<InterfaceRecord> = z.object({
  id: z.string().startsWith('if-'),
  key: z.string(),
  seed: z.string(),
  hostId: z.string(),
  linkAddress: z.string().nullable(),
  names: z.array(ProvenancedValueSchema),
  addresses: z.array(ProvenancedValueSchema),
  conflicts: z.array(IpConflictSchema),
  firstSeen: timestamp,
  lastSeen: timestamp,
  provenance: ids,
  mergedFrom: ids,
  mergedInto: z.string().nullable(),
});

const linkBase = {
  id: z.string().startsWith('link-'),
  confidence: z.number().min(0).max(1),
  status: z.enum(['proposed', 'confirmed', 'stale']),
  sources: ids,
  firstSeen: timestamp,
  lastSeen: timestamp,
  provenance: ids,
  mergedFrom: ids,
  mergedInto: z.string().nullable(),
};

export const LinkRecordSchema: z.ZodType<LinkRecord> = z.discriminatedUnion('kind', [
  z.object({
    ...linkBase,
    kind: z.literal('adjacency'),
    endpoints: z.tuple([z.string(), z.string()]),
  }),
  z.object({
    ...linkBase,
    kind: z.literal('route'),
    from: z.string(),
    to: z.string().nullable(),
    gatewayIp: z.string().nullable(),
    destination: z.string(),
    metric: z.number().int().min(0),
    metricObservedAt: timestamp,
  }),
]);

const observationBase = {
  id: z.string().startsWith('obs-'),
  sourceHostId: z.string().min(1),
  observedAt: timestamp,
};

export const ObservationRecordSchema: z.ZodType<ObservationRecord> = z.discriminatedUnion('kind', [
  z.object({
    ...observationBase,
    kind: z.literal('arp'),
    localInterface: z.string(),
    localIp: z.string().nullable(),
    localLinkAddress: z.string().nullable(),
    neighborIp: z.string(),
    neighborLinkAddress: z.string(),
  }),
  z.object({
    ...observationBase,
    kind: z.literal('route'),
    destination: z.string(),
    gateway: z.string().nullable(),
    outgoingInterface: z.string(),
    localIp: z.string().nullable(),
    metric: z.number().int().min(0),
  }),
  z.object({
    ...observationBase,
    kind: z.literal('alias'),
    aliasHostId: z.string().nullable(),
    linkAddress: z.string().nullable(),
    localInterface: z.string().nullable(),
  }),
]);

export interface PersistedGraph extends GraphCollections {
  version: typeof PERSISTED_VERSION;
  exportedAt: number;
}

export const PersistedGraphSchema: z.ZodType<PersistedGraph> = z.object({
  version: z.literal(PERSISTED_VERSION),
  exportedAt: timestamp,
  hosts: z.array(HostRecordSchema),
  interfaces: z.array(InterfaceRecordSchema),
  links: z.array(LinkRecordSchema),
  observations: z.array(ObservationRecordSchema),
});
