/**
 * TopologyService: ingestion pipeline and query API over a GraphStore.
 *
 * Each `ingest` call is one batch: normalized, fused inside one store
 * transaction, retried on transient store failures and reported through a
 * MergeReport. Batches run on a bounded pool; overlapping batches serialise
 * on entity locks inside the store, disjoint ones run side by side.
 */

import { nanoid } from 'nanoid';
import { AsyncSemaphore } from '../core/mutex.js';
import { EventBus } from '../core/events.js';
import {
  IngestCancelledError,
  NetfuseError,
  NotFoundError,
  StoreCorruptionError,
  StoreTransactionError,
  toError,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { NetfuseConfigSchema } from '../core/types.js';
import type { IngestConfig, NetfuseConfig, TopologyConfig } from '../core/types.js';
import { parseIp } from '../model/address.js';
import type {
  GraphCollections,
  GraphFilter,
  GraphSnapshot,
  HostRecord,
  InterfaceRecord,
  MergeReport,
} from '../model/graph.js';
import type { RawObservation } from '../model/records.js';
import { normalizeBatch } from '../normalizer/normalizer.js';
import { pickOwner } from '../identity/resolver.js';
import { PERSISTED_VERSION, PersistedGraphSchema } from '../store/persisted.js';
import type { PersistedGraph } from '../store/persisted.js';
import type { GraphStore } from '../store/types.js';
import { isStale } from '../topology/confidence.js';
import { FusionEngine } from '../topology/fusion-engine.js';
import { buildSnapshot } from '../topology/snapshot.js';
import { retry } from '../utils/retry.js';

export interface TopologyServiceOptions {
  store: GraphStore;
  config?: NetfuseConfig;
  events?: EventBus;
  /** Epoch milliseconds; injectable for tests. */
  clock?: () => number;
}

/** The other side of an operator alias: a vantage host id, or a link address. */
export type AliasTarget = { hostId: string } | { linkAddress: string };

export interface IngestOptions {
  /** Drop and rebuild the store before ingesting. */
  forceRecreate?: boolean;
  /** Run the whole batch, report, and roll back. */
  dryRun?: boolean;
  signal?: AbortSignal;
  batchId?: string;
}

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class TopologyService {
  readonly events: EventBus;
  readonly store: GraphStore;

  private readonly ingestConfig: IngestConfig;
  private readonly topology: TopologyConfig;
  private readonly transactionTimeoutMs: number;
  private readonly engine: FusionEngine;
  private readonly pool: AsyncSemaphore;
  private readonly clock: () => number;
  private halted: StoreCorruptionError | null = null;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: TopologyServiceOptions) {
    const config = options.config ?? NetfuseConfigSchema.parse({});
    this.store = options.store;
    this.events = options.events ?? new EventBus();
    this.clock = options.clock ?? Date.now;
    this.ingestConfig = config.ingest;
    this.topology = config.topology;
    this.transactionTimeoutMs = config.store.transactionTimeoutMs;
    this.engine = new FusionEngine(config.topology);
    this.pool = new AsyncSemaphore(config.ingest.maxConcurrentBatches);
  }

  // ─── Ingestion ─────────────────────────────────────────────

  async ingest(sourceHostId: string, records: readonly unknown[], options: IngestOptions = {}): Promise<MergeReport> {
    const logger = getLogger();
    const batchId = options.batchId ?? nanoid(12);

    if (!sourceHostId.trim()) {
      throw new NetfuseError('Source host id must not be empty', 'INVALID_ARGUMENT', 'normalize');
    }

    const release = await this.pool.acquire();
    const started = this.clock();
    try {
      this.assertHealthy();

      if (options.forceRecreate) {
        if (options.dryRun) {
          logger.info({ batchId }, 'Dry run: keeping the existing store despite forceRecreate');
        } else {
          logger.warn({ batchId }, 'Recreating graph store before ingest');
          await this.store.reset();
        }
      }

      const { records: normalized, errors } = normalizeBatch(records, sourceHostId);
      if (errors.length > 0) {
        logger.debug({ batchId, rejected: errors.length }, 'Records rejected during normalization');
      }
      this.events.emit('batch:started', { batchId, sourceHostId, records: records.length });

      let attempts = 0;
      const outcome = await retry(
        async () => {
          attempts++;
          if (options.signal?.aborted) throw new IngestCancelledError(batchId);
          return this.store.transaction(tx => this.engine.applyBatch(tx, normalized), {
            owner: `${batchId}#${attempts}`,
            timeoutMs: this.transactionTimeoutMs,
            signal: options.signal,
            dryRun: options.dryRun,
          });
        },
        {
          maxRetries: this.ingestConfig.maxRetries,
          baseDelay: this.ingestConfig.retryBaseDelayMs,
          maxDelay: this.ingestConfig.retryMaxDelayMs,
          backoffFactor: 2,
          shouldRetry: error => error instanceof StoreTransactionError,
          onRetry: (attempt, error) => {
            logger.warn({ batchId, attempt, error: error.message }, 'Retrying batch after transient store failure');
            this.events.emit('batch:retry', { batchId, attempt, error: error.message });
          },
        },
      );

      const report: MergeReport = {
        batchId,
        sourceHostId,
        accepted: normalized.length,
        rejected: errors.length,
        duplicates: outcome.duplicates,
        errors,
        created: outcome.created,
        conflicts: outcome.conflicts,
        mergedHosts: outcome.mergedHosts,
        reconciledRoutes: outcome.reconciledRoutes,
        attempts,
        dryRun: options.dryRun ?? false,
      };

      if (!report.dryRun) {
        for (const merge of report.mergedHosts) this.events.emit('host:merged', merge);
        for (const conflict of report.conflicts) this.events.emit('identity:conflict', conflict);
      }
      const durationMs = this.clock() - started;
      this.events.emit('batch:committed', { report, durationMs });
      logger.info(
        { batchId, sourceHostId, accepted: report.accepted, rejected: report.rejected, duplicates: report.duplicates, attempts, durationMs, dryRun: report.dryRun },
        'Batch ingested',
      );
      return report;
    } catch (err) {
      const error = toError(err);
      if (error instanceof StoreCorruptionError && !this.halted) {
        this.halted = error;
        logger.fatal({ batchId, error: error.message }, 'Graph store corrupted; ingestion halted');
        this.events.emit('store:corrupted', { error });
      }
      logger.error({ batchId, sourceHostId, error: error.message }, 'Batch failed');
      this.events.emit('batch:failed', { batchId, sourceHostId, error });
      throw error;
    } finally {
      release();
    }
  }

  /**
   * Operator aliasing: declare that `target` belongs to the same machine as
   * `sourceHostId`. A malformed link address is rejected like any other
   * record and shows up in the report.
   */
  async alias(sourceHostId: string, target: AliasTarget, observedAt?: number): Promise<MergeReport> {
    const at = observedAt ?? this.clock();
    const record: RawObservation = 'linkAddress' in target
      ? { kind: 'alias', observedAt: at, linkAddress: target.linkAddress }
      : { kind: 'alias', observedAt: at, aliasHostId: target.hostId };
    return this.ingest(sourceHostId, [record]);
  }

  // ─── Queries ───────────────────────────────────────────────

  async getGraph(filter: GraphFilter = {}): Promise<GraphSnapshot> {
    return buildSnapshot(await this.store.readAll(), filter, this.topology, this.clock());
  }

  /** Host by id; absorbed ids resolve to the surviving host. */
  async getHost(id: string): Promise<HostRecord> {
    let host = await this.store.getRecord('hosts', id);
    for (let hops = 0; host && host.mergedInto !== null; hops++) {
      if (hops > 64) throw new StoreCorruptionError(`Merge chain from ${id} does not terminate`);
      host = await this.store.getRecord('hosts', host.mergedInto);
    }
    if (!host) throw new NotFoundError('Host', id);
    return host;
  }

  /** Interface by id; a bound interface resolves to the one it was folded into. */
  async getInterface(id: string): Promise<InterfaceRecord> {
    const record = await this.store.getRecord('interfaces', id);
    if (!record) throw new NotFoundError('Interface', id);
    if (record.mergedInto === null) return record;

    const target = await this.store.getRecord('interfaces', record.mergedInto);
    if (!target || target.mergedInto !== null) {
      throw new StoreCorruptionError(`Interface ${id} redirects to missing or bound interface ${record.mergedInto}`);
    }
    return target;
  }

  /** Interface currently holding `ip`: the latest claim wins. */
  async currentOwner(ip: string): Promise<InterfaceRecord | undefined> {
    const parsed = parseIp(ip);
    if (!parsed) return undefined;
    return pickOwner(await this.store.interfacesByIp(parsed.text), parsed.text);
  }

  // ─── Staleness ─────────────────────────────────────────────

  /** Persist `stale` on every link not corroborated within the window. */
  async sweepStale(asOf: number = this.clock()): Promise<string[]> {
    this.assertHealthy();
    const { links } = await this.store.readAll();
    const candidates = links
      .filter(link => link.mergedInto === null && link.status !== 'stale' && isStale(link, asOf, this.topology))
      .map(link => link.id);
    if (candidates.length === 0) return [];

    const swept = await retry(
      () => this.store.transaction(async tx => {
        const marked: string[] = [];
        for (const id of candidates) {
          const link = await tx.get('links', id);
          if (!link || link.mergedInto !== null || link.status === 'stale' || !isStale(link, asOf, this.topology)) continue;
          await tx.put('links', { ...link, status: 'stale' });
          marked.push(id);
        }
        return marked;
      }, { timeoutMs: this.transactionTimeoutMs }),
      {
        maxRetries: this.ingestConfig.maxRetries,
        baseDelay: this.ingestConfig.retryBaseDelayMs,
        maxDelay: this.ingestConfig.retryMaxDelayMs,
        shouldRetry: error => error instanceof StoreTransactionError,
      },
    );

    if (swept.length > 0) {
      getLogger().info({ count: swept.length, asOf }, 'Links marked stale');
      this.events.emit('link:stale', { linkIds: swept, asOf });
    }
    return swept;
  }

  startStaleSweep(intervalMs: number = this.topology.sweepIntervalMs): void {
    if (intervalMs <= 0 || this.sweepTimer) return;
    const logger = getLogger();
    this.sweepTimer = setInterval(() => {
      this.sweepStale().catch(err => {
        logger.error({ error: toError(err).message }, 'Stale sweep failed');
      });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  async close(): Promise<void> {
    this.stop();
    await this.store.close();
  }

  // ─── Export / import ───────────────────────────────────────

  async exportGraph(): Promise<PersistedGraph> {
    const collections = await this.store.readAll();
    return { version: PERSISTED_VERSION, exportedAt: this.clock(), ...collections };
  }

  /** Replace the stored graph with a previously exported one. */
  async importGraph(data: unknown): Promise<GraphCollections> {
    const parsed = PersistedGraphSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new StoreCorruptionError(`Invalid graph export at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'unknown'}`);
    }

    const { hosts, interfaces, links, observations } = parsed.data;
    const collections: GraphCollections = { hosts, interfaces, links, observations };
    checkReferences(collections);

    await this.store.load(collections);
    getLogger().info(
      { hosts: hosts.length, interfaces: interfaces.length, links: links.length, observations: observations.length },
      'Graph imported',
    );
    return collections;
  }

  isHalted(): boolean {
    return this.halted !== null;
  }

  private assertHealthy(): void {
    if (this.halted) throw this.halted;
  }
}

// ═══════════════════════════════════════════════════════════════
// REFERENTIAL CHECKS
// ═══════════════════════════════════════════════════════════════

function checkReferences(graph: GraphCollections): void {
  const hosts = new Map(graph.hosts.map(host => [host.id, host]));
  const interfaces = new Map(graph.interfaces.map(record => [record.id, record]));
  const links = new Map(graph.links.map(link => [link.id, link]));
  const observations = new Set(graph.observations.map(record => record.id));

  const fail = (message: string): never => {
    throw new StoreCorruptionError(`Invalid graph export: ${message}`);
  };
  const checkProvenance = (owner: string, ids: readonly string[]): void => {
    for (const id of ids) if (!observations.has(id)) fail(`${owner} cites unknown observation ${id}`);
  };
  const checkRedirect = (owner: string, target: { mergedInto: string | null } | undefined): void => {
    if (!target || target.mergedInto !== null) fail(`${owner} redirects to a missing or absorbed record`);
  };

  for (const host of graph.hosts) {
    if (host.mergedInto !== null) checkRedirect(`host ${host.id}`, hosts.get(host.mergedInto));
    for (const id of host.interfaceIds) if (!interfaces.has(id)) fail(`host ${host.id} lists unknown interface ${id}`);
    checkProvenance(`host ${host.id}`, host.provenance);
  }

  for (const record of graph.interfaces) {
    const host = hosts.get(record.hostId);
    if (record.mergedInto !== null) {
      checkRedirect(`interface ${record.id}`, interfaces.get(record.mergedInto));
      if (!host) fail(`interface ${record.id} belongs to missing host ${record.hostId}`);
    } else if (!host || host.mergedInto !== null) {
      fail(`interface ${record.id} belongs to missing or absorbed host ${record.hostId}`);
    }
    checkProvenance(`interface ${record.id}`, record.provenance);
  }

  for (const link of graph.links) {
    if (link.mergedInto !== null) checkRedirect(`link ${link.id}`, links.get(link.mergedInto));
    const ends = link.kind === 'adjacency' ? [...link.endpoints] : link.to === null ? [link.from] : [link.from, link.to];
    for (const id of ends) if (!interfaces.has(id)) fail(`link ${link.id} references unknown interface ${id}`);
    checkProvenance(`link ${link.id}`, link.provenance);
  }
}
