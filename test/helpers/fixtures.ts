/**
 * Shared builders for topology tests.
 */

import { NetfuseConfigSchema } from '../../src/core/types.js';
import type { NetfuseConfig } from '../../src/core/types.js';
import type { GraphSnapshot } from '../../src/model/graph.js';
import type { RawObservation } from '../../src/model/records.js';
import { TopologyService } from '../../src/service/topology-service.js';
import { MemoryGraphStore } from '../../src/store/memory-store.js';
import type { GraphStore } from '../../src/store/types.js';

export const T0 = Date.UTC(2024, 0, 1);
export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;

export function arp(
  observedAt: number,
  neighborIp: string,
  neighborLinkAddress: string,
  extra: { localInterface?: string; localIp?: string; localLinkAddress?: string } = {},
): RawObservation {
  return {
    kind: 'arp',
    observedAt,
    localInterface: extra.localInterface ?? 'eth0',
    localIp: extra.localIp,
    localLinkAddress: extra.localLinkAddress,
    neighborIp,
    neighborLinkAddress,
  };
}

export function route(
  observedAt: number,
  destination: string,
  gateway: string | null,
  extra: { outgoingInterface?: string; localIp?: string; metric?: number } = {},
): RawObservation {
  return {
    kind: 'route',
    observedAt,
    destination,
    gateway,
    outgoingInterface: extra.outgoingInterface ?? 'eth0',
    localIp: extra.localIp,
    metric: extra.metric ?? 0,
  };
}

export function testConfig(overrides: { topology?: Partial<NetfuseConfig['topology']>; ingest?: Partial<NetfuseConfig['ingest']>; store?: Partial<NetfuseConfig['store']> } = {}): NetfuseConfig {
  return NetfuseConfigSchema.parse({
    store: { driver: 'memory', ...overrides.store },
    ingest: { retryBaseDelayMs: 1, retryMaxDelayMs: 10, ...overrides.ingest },
    topology: { ...overrides.topology },
  });
}

export function createService(
  options: { config?: NetfuseConfig; store?: GraphStore; now?: number } = {},
): TopologyService {
  const config = options.config ?? testConfig();
  const now = options.now ?? T0 + HOUR;
  return new TopologyService({
    store: options.store ?? new MemoryGraphStore({ transactionTimeoutMs: config.store.transactionTimeoutMs }),
    config,
    clock: () => now,
  });
}

/** Snapshot minus the capture time, for equality checks between graphs. */
export async function liveGraph(service: TopologyService): Promise<Omit<GraphSnapshot, 'takenAt'>> {
  const { takenAt: _takenAt, ...rest } = await service.getGraph({ includeStale: true });
  return rest;
}
