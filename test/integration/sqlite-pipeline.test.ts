import { describe, it, expect, afterEach } from 'vitest';
import { MemoryGraphStore } from '../../src/store/memory-store.js';
import { SqliteGraphStore } from '../../src/store/sqlite-store.js';
import type { GraphStore } from '../../src/store/types.js';
import { T0, arp, createService, liveGraph, route } from '../helpers/fixtures.js';

const BATCHES = [
  { source: 'r1', records: [arp(T0, '10.0.0.2', 'aa:bb:cc:00:00:02', { localIp: '10.0.0.1', localLinkAddress: 'aa:bb:cc:00:00:01' })] },
  { source: 'r2', records: [arp(T0 + 1, '10.0.0.1', 'aa:bb:cc:00:00:01'), route(T0 + 1, '10.20.0.0/16', '10.0.0.1')] },
  { source: 'r3', records: [arp(T0 + 2, '10.0.0.2', 'aa:bb:cc:00:00:07'), { kind: 'alias', observedAt: T0 + 2, aliasHostId: 'r2' }] },
];

describe('SQLite-backed pipeline', () => {
  const stores: GraphStore[] = [];

  afterEach(async () => {
    for (const store of stores.splice(0)) await store.close();
  });

  it('should build the same graph as the in-memory store', async () => {
    const memory = new MemoryGraphStore();
    const sqlite = new SqliteGraphStore(':memory:');
    stores.push(memory, sqlite);

    const onMemory = createService({ store: memory });
    const onSqlite = createService({ store: sqlite });
    for (const batch of BATCHES) {
      await onMemory.ingest(batch.source, batch.records);
      await onSqlite.ingest(batch.source, batch.records);
    }

    expect(await liveGraph(onSqlite)).toEqual(await liveGraph(onMemory));
    expect(await sqlite.readAll()).toEqual(await memory.readAll());
  });
});
