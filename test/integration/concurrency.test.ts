import { describe, it, expect, vi } from 'vitest';
import { IngestCancelledError } from '../../src/core/errors.js';
import { hostIdFor } from '../../src/model/ids.js';
import type { RawObservation } from '../../src/model/records.js';
import { MemoryGraphStore } from '../../src/store/memory-store.js';
import { lockKey } from '../../src/store/types.js';
import { sleep } from '../../src/utils/retry.js';
import { T0, arp, createService, liveGraph, route, testConfig } from '../helpers/fixtures.js';

const GATEWAY_MAC = 'aa:bb:cc:00:00:01';

function vantageBatch(n: number): { source: string; records: RawObservation[] } {
  const suffix = (10 + n).toString(16).padStart(2, '0');
  return {
    source: `host-${n}`,
    records: [
      arp(T0 + n, '10.0.0.1', GATEWAY_MAC),
      arp(T0 + n, `10.0.1.${n}`, `aa:bb:cc:00:01:${suffix}`),
      route(T0 + n, '0.0.0.0/0', '10.0.0.1'),
    ],
  };
}

describe('concurrent ingestion', () => {
  it('should produce the sequential graph when overlapping batches run at once', async () => {
    const batches = Array.from({ length: 8 }, (_, i) => vantageBatch(i + 1));

    const sequential = createService();
    for (const batch of batches) await sequential.ingest(batch.source, batch.records);

    const concurrent = createService();
    const reports = await Promise.all(batches.map(batch => concurrent.ingest(batch.source, batch.records)));

    expect(reports.every(report => report.accepted === 3)).toBe(true);
    expect(await liveGraph(concurrent)).toEqual(await liveGraph(sequential));
  });

  it('should retry a batch that timed out waiting for a lock', async () => {
    const store = new MemoryGraphStore({ transactionTimeoutMs: 30 });
    const service = createService({
      store,
      config: testConfig({
        store: { transactionTimeoutMs: 30 },
        ingest: { maxRetries: 10, retryBaseDelayMs: 20, retryMaxDelayMs: 200 },
      }),
    });
    const retried = vi.fn();
    service.events.on('batch:retry', retried);

    const holder = store.transaction(async tx => {
      await tx.lock([lockKey('hosts', hostIdFor('src:r1'))]);
      await sleep(100);
    }, { timeoutMs: 1000 });

    const report = await service.ingest('r1', [arp(T0, '10.0.0.2', 'aa:bb:cc:00:00:02')]);
    await holder;

    expect(report.attempts).toBeGreaterThan(1);
    expect(retried).toHaveBeenCalled();
    expect((await store.count()).observations).toBe(1);
  });

  it('should leave nothing behind when a batch is cancelled', async () => {
    const service = createService();
    const failed = vi.fn();
    service.events.on('batch:failed', failed);
    const controller = new AbortController();
    controller.abort();

    await expect(service.ingest('r1', [arp(T0, '10.0.0.2', 'aa:bb:cc:00:00:02')], { signal: controller.signal, batchId: 'b9' }))
      .rejects.toBeInstanceOf(IngestCancelledError);
    expect(failed.mock.calls[0][0]).toMatchObject({ batchId: 'b9', sourceHostId: 'r1' });
    expect(await service.store.count()).toEqual({ hosts: 0, interfaces: 0, links: 0, observations: 0 });
    expect(service.isHalted()).toBe(false);
  });
});
