import type { InterfaceRecord, LinkRecord } from '../model/graph.js';
import { emptyWriteSet } from './types.js';
import type { CollectionMap, CollectionName, GraphTransaction, WriteSet } from './types.js';

type IdSets = { [C in CollectionName]: Set<string> };

function emptyIdSets(): IdSets {
  return { hosts: new Set(), interfaces: new Set(), links: new Set(), observations: new Set() };
}

/**
 * Batch-local cache over a transaction: every entity is read once, edited
 * in memory and written back once by `flush()`.
 */
export class WorkingSet {
  private readonly cache: WriteSet = emptyWriteSet();
  private readonly dirty: IdSets = emptyIdSets();
  private readonly created: IdSets = emptyIdSets();

  constructor(readonly tx: GraphTransaction) {}

  async get<C extends CollectionName>(collection: C, id: string): Promise<CollectionMap[C] | undefined> {
    const cached = this.cache[collection].get(id);
    if (cached) return cached;

    const stored = await this.tx.get(collection, id);
    if (stored) this.cache[collection].set(id, stored);
    return stored;
  }

  /** Replace the cached copy of a record and schedule it for writing. */
  set<C extends CollectionName>(collection: C, record: CollectionMap[C]): void {
    this.cache[collection].set(record.id, record);
    this.dirty[collection].add(record.id);
  }

  create<C extends CollectionName>(collection: C, record: CollectionMap[C]): void {
    this.set(collection, record);
    this.created[collection].add(record.id);
  }

  wasCreated(collection: CollectionName, id: string): boolean {
    return this.created[collection].has(id);
  }

  createdIds(collection: CollectionName): string[] {
    return [...this.created[collection]].sort();
  }

  /** Live interfaces claiming `ip`, committed or pending. */
  async interfacesByIp(ip: string): Promise<InterfaceRecord[]> {
    const holds = (record: InterfaceRecord) =>
      record.mergedInto === null && record.addresses.some(address => address.value === ip);

    const ids = new Set(await this.tx.interfacesByIp(ip));
    for (const record of this.cache.interfaces.values()) {
      if (holds(record)) ids.add(record.id);
    }
    return (await this.loadAll('interfaces', ids)).filter(holds);
  }

  /** Live links anchored on `interfaceId`, committed or pending. */
  async linksByEndpoint(interfaceId: string): Promise<LinkRecord[]> {
    const anchors = (link: LinkRecord) =>
      link.mergedInto === null && (link.kind === 'adjacency' ? link.endpoints.includes(interfaceId) : link.from === interfaceId);

    const ids = new Set(await this.tx.linksByEndpoint(interfaceId));
    for (const record of this.cache.links.values()) {
      if (anchors(record)) ids.add(record.id);
    }
    return (await this.loadAll('links', ids)).filter(anchors);
  }

  /** Live route links through gateway `ip`, committed or pending. */
  async routesByGateway(ip: string): Promise<LinkRecord[]> {
    const through = (link: LinkRecord) => link.mergedInto === null && link.kind === 'route' && link.gatewayIp === ip;

    const ids = new Set(await this.tx.routesByGateway(ip));
    for (const record of this.cache.links.values()) {
      if (through(record)) ids.add(record.id);
    }
    return (await this.loadAll('links', ids)).filter(through);
  }

  async flush(): Promise<number> {
    let written = 0;
    written += await this.flushCollection('observations');
    written += await this.flushCollection('hosts');
    written += await this.flushCollection('interfaces');
    written += await this.flushCollection('links');
    return written;
  }

  private async loadAll<C extends CollectionName>(collection: C, ids: Set<string>): Promise<Array<CollectionMap[C]>> {
    const records: Array<CollectionMap[C]> = [];
    for (const id of [...ids].sort()) {
      const record = await this.get(collection, id);
      if (record) records.push(record);
    }
    return records;
  }

  private async flushCollection<C extends CollectionName>(collection: C): Promise<number> {
    let written = 0;
    for (const id of [...this.dirty[collection]].sort()) {
      const record = this.cache[collection].get(id);
      if (!record) continue;
      await this.tx.put(collection, record);
      written++;
    }
    this.dirty[collection].clear();
    return written;
  }
}
