import { nanoid } from 'nanoid';
import { AsyncRWLock, KeyedLock } from '../core/mutex.js';
import {
  IngestCancelledError,
  LockTimeoutError,
  NetfuseError,
  StoreTransactionError,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { GraphCollections, InterfaceRecord, LinkRecord } from '../model/graph.js';
import { emptyWriteSet, lockKey } from './types.js';
import type {
  CollectionMap,
  CollectionName,
  GraphStore,
  GraphTransaction,
  IndexName,
  TransactionOptions,
  WriteSet,
} from './types.js';

export interface StoreOptions {
  transactionTimeoutMs?: number;
}

/** Synchronous reads of committed state, as seen by a transaction. */
interface CommittedView {
  readRecord<C extends CollectionName>(collection: C, id: string): CollectionMap[C] | undefined;
  readIndex(index: IndexName, key: string): string[];
}

interface TransactionContext {
  owner: string;
  deadline: number;
  signal?: AbortSignal;
}

// ═══════════════════════════════════════════════════════════════
// OVERLAY TRANSACTION
// ═══════════════════════════════════════════════════════════════

/**
 * Strict two-phase locking over a private write overlay. Locks are taken
 * as keys are touched and all released at the end; nothing reaches the
 * backend until the owning store commits the overlay in one step.
 */
class OverlayTransaction implements GraphTransaction {
  readonly owner: string;
  readonly writes: WriteSet = emptyWriteSet();
  private held = new Set<string>();

  constructor(
    private readonly committed: CommittedView,
    private readonly locks: KeyedLock,
    private readonly context: TransactionContext,
  ) {
    this.owner = context.owner;
  }

  async get<C extends CollectionName>(collection: C, id: string): Promise<CollectionMap[C] | undefined> {
    await this.acquire(lockKey(collection, id));
    const pending = this.writes[collection].get(id);
    if (pending) return structuredClone(pending);
    return this.committed.readRecord(collection, id);
  }

  async put<C extends CollectionName>(collection: C, record: CollectionMap[C]): Promise<void> {
    await this.acquire(lockKey(collection, record.id));
    // Entries the previous version held are dropped at commit, so lock them too.
    const previous = this.writes[collection].get(record.id) ?? this.committed.readRecord(collection, record.id);
    const keys = [...indexKeysOf(record), ...(previous ? indexKeysOf(previous) : [])];
    await this.lock(keys);
    this.writes[collection].set(record.id, structuredClone(record));
  }

  async lock(keys: Iterable<string>): Promise<void> {
    const sorted = [...new Set(keys)].sort();
    for (const key of sorted) {
      await this.acquire(key);
    }
  }

  async interfacesByIp(ip: string): Promise<string[]> {
    await this.acquire(lockKey('ip', ip));
    const ids = new Set(this.committed.readIndex('ip', ip));
    for (const record of this.writes.interfaces.values()) {
      if (record.addresses.some(address => address.value === ip)) ids.add(record.id);
    }
    return [...ids].sort();
  }

  async routesByGateway(ip: string): Promise<string[]> {
    await this.acquire(lockKey('gateway', ip));
    const ids = new Set(this.committed.readIndex('gateway', ip));
    for (const record of this.writes.links.values()) {
      if (record.kind === 'route' && record.gatewayIp === ip) ids.add(record.id);
    }
    return [...ids].sort();
  }

  async linksByEndpoint(interfaceId: string): Promise<string[]> {
    await this.acquire(lockKey('endpoint', interfaceId));
    const ids = new Set(this.committed.readIndex('endpoint', interfaceId));
    for (const record of this.writes.links.values()) {
      if (linkEndpointsOf(record).includes(interfaceId)) ids.add(record.id);
    }
    return [...ids].sort();
  }

  checkpoint(): void {
    if (this.context.signal?.aborted) {
      throw new IngestCancelledError(this.owner);
    }
    if (Date.now() > this.context.deadline) {
      throw new StoreTransactionError(`Transaction ${this.owner} exceeded its deadline`);
    }
  }

  pendingCount(): number {
    return Object.values(this.writes).reduce((sum, map) => sum + map.size, 0);
  }

  heldCount(): number {
    return this.held.size;
  }

  releaseAll(): void {
    this.locks.release(this.owner, this.held);
    this.held.clear();
  }

  private async acquire(key: string): Promise<void> {
    if (this.held.has(key)) return;
    this.checkpoint();

    const remaining = this.context.deadline - Date.now();
    try {
      await this.locks.acquire(key, this.owner, remaining);
    } catch (err) {
      if (err instanceof LockTimeoutError) {
        throw new StoreTransactionError(`Transaction ${this.owner} timed out waiting for ${key}`, err);
      }
      throw err;
    }
    this.held.add(key);
  }
}

function indexKeysOf(record: CollectionMap[CollectionName]): string[] {
  return indexEntriesOf(record).map(entry => lockKey(entry.index, entry.key));
}

function linkEndpointsOf(link: LinkRecord): string[] {
  return link.kind === 'adjacency' ? [...link.endpoints] : [link.from];
}

// ═══════════════════════════════════════════════════════════════
// BASE STORE
// ═══════════════════════════════════════════════════════════════

/**
 * Shared transaction machinery. Backends only provide synchronous
 * primitives; commit and snapshot reads are single synchronous steps, so
 * no reader ever observes half a batch.
 */
export abstract class TransactionalGraphStore implements GraphStore {
  abstract readonly driver: 'sqlite' | 'memory';

  protected readonly locks = new KeyedLock();
  private readonly gate = new AsyncRWLock();
  private readonly transactionTimeoutMs: number;
  private closed = false;

  constructor(options: StoreOptions = {}) {
    this.transactionTimeoutMs = options.transactionTimeoutMs ?? 5000;
  }

  protected abstract readRecord<C extends CollectionName>(collection: C, id: string): CollectionMap[C] | undefined;
  protected abstract readIndex(index: IndexName, key: string): string[];
  /** Apply a write set atomically; with `replace`, everything else is dropped first. */
  protected abstract applyWrites(writes: WriteSet, replace: boolean): void;
  protected abstract readCollections(): GraphCollections;
  protected abstract countRecords(): Record<CollectionName, number>;
  protected abstract closeBackend(): void;

  async transaction<T>(work: (tx: GraphTransaction) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    this.assertOpen();
    const logger = getLogger();
    const releaseGate = await this.gate.acquireRead();

    const tx = new OverlayTransaction(
      {
        readRecord: <C extends CollectionName>(collection: C, id: string) => this.readRecord(collection, id),
        readIndex: (index: IndexName, key: string) => this.readIndex(index, key),
      },
      this.locks,
      {
        owner: options.owner ?? `tx-${nanoid(10)}`,
        deadline: Date.now() + (options.timeoutMs ?? this.transactionTimeoutMs),
        signal: options.signal,
      },
    );

    try {
      const result = await work(tx);
      tx.checkpoint();
      if (options.dryRun) {
        logger.debug({ owner: tx.owner, writes: tx.pendingCount() }, 'Dry run: discarding transaction writes');
      } else {
        this.applyWrites(tx.writes, false);
        logger.debug({ owner: tx.owner, writes: tx.pendingCount(), locks: tx.heldCount() }, 'Transaction committed');
      }
      return result;
    } finally {
      tx.releaseAll();
      releaseGate();
    }
  }

  async readAll(): Promise<GraphCollections> {
    this.assertOpen();
    return this.gate.withRead(() => this.readCollections());
  }

  async getRecord<C extends CollectionName>(collection: C, id: string): Promise<CollectionMap[C] | undefined> {
    this.assertOpen();
    return this.gate.withRead(() => this.readRecord(collection, id));
  }

  async interfacesByIp(ip: string): Promise<InterfaceRecord[]> {
    this.assertOpen();
    return this.gate.withRead(() => {
      const found: InterfaceRecord[] = [];
      for (const id of this.readIndex('ip', ip)) {
        const record = this.readRecord('interfaces', id);
        if (record && record.mergedInto === null) found.push(record);
      }
      return found;
    });
  }

  async count(): Promise<Record<CollectionName, number>> {
    this.assertOpen();
    return this.gate.withRead(() => this.countRecords());
  }

  async reset(): Promise<void> {
    this.assertOpen();
    await this.gate.withWrite(() => this.applyWrites(emptyWriteSet(), true));
    getLogger().info({ driver: this.driver }, 'Graph store reset');
  }

  async load(data: GraphCollections): Promise<void> {
    this.assertOpen();
    const writes = emptyWriteSet();
    for (const host of data.hosts) writes.hosts.set(host.id, host);
    for (const iface of data.interfaces) writes.interfaces.set(iface.id, iface);
    for (const link of data.links) writes.links.set(link.id, link);
    for (const observation of data.observations) writes.observations.set(observation.id, observation);

    await this.gate.withWrite(() => this.applyWrites(writes, true));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    // Let running transactions finish before the backend goes away.
    await this.gate.withWrite(() => {
      this.closed = true;
      this.closeBackend();
    });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new NetfuseError('Graph store is closed', 'STORE_CLOSED', 'store');
    }
  }
}

export interface IndexEntry {
  index: IndexName;
  key: string;
}

/** Index entries implied by a record. Redirects carry no claims and anchor nothing. */
export function indexEntriesOf(record: CollectionMap[CollectionName]): IndexEntry[] {
  if ('addresses' in record) {
    return record.addresses.map(address => ({ index: 'ip', key: address.value }));
  }
  if (!('confidence' in record) || record.mergedInto !== null) return [];

  const entries: IndexEntry[] = linkEndpointsOf(record).map(id => ({ index: 'endpoint', key: id }));
  if (record.kind === 'route' && record.gatewayIp !== null) {
    entries.push({ index: 'gateway', key: record.gatewayIp });
  }
  return entries;
}
