import type { GraphCollections } from '../model/graph.js';
import { TransactionalGraphStore, indexEntriesOf } from './transactional-store.js';
import type { StoreOptions } from './transactional-store.js';
import { COLLECTIONS, emptyWriteSet } from './types.js';
import type { CollectionMap, CollectionName, IndexName, WriteSet } from './types.js';

/**
 * In-process graph store. Records are cloned on the way in and out so that
 * callers never share objects with committed state.
 */
export class MemoryGraphStore extends TransactionalGraphStore {
  readonly driver = 'memory';
  private data: WriteSet = emptyWriteSet();
  private indexes = emptyIndexes();

  constructor(options: StoreOptions = {}) {
    super(options);
  }

  protected readRecord<C extends CollectionName>(collection: C, id: string): CollectionMap[C] | undefined {
    const record = this.data[collection].get(id);
    return record === undefined ? undefined : structuredClone(record);
  }

  protected readIndex(index: IndexName, key: string): string[] {
    return [...(this.indexes[index].get(key) ?? [])].sort();
  }

  protected applyWrites(writes: WriteSet, replace: boolean): void {
    if (replace) {
      this.data = emptyWriteSet();
      this.indexes = emptyIndexes();
    }
    this.copyInto('hosts', writes);
    this.copyInto('interfaces', writes);
    this.copyInto('links', writes);
    this.copyInto('observations', writes);
  }

  protected readCollections(): GraphCollections {
    return {
      hosts: this.sortedValues('hosts'),
      interfaces: this.sortedValues('interfaces'),
      links: this.sortedValues('links'),
      observations: this.sortedValues('observations'),
    };
  }

  protected countRecords(): Record<CollectionName, number> {
    const counts = { hosts: 0, interfaces: 0, links: 0, observations: 0 };
    for (const collection of COLLECTIONS) counts[collection] = this.data[collection].size;
    return counts;
  }

  protected closeBackend(): void {
    this.data = emptyWriteSet();
    this.indexes = emptyIndexes();
  }

  private copyInto<C extends CollectionName>(collection: C, writes: WriteSet): void {
    for (const [id, record] of writes[collection]) {
      const previous = this.data[collection].get(id);
      if (previous) {
        for (const entry of indexEntriesOf(previous)) this.indexes[entry.index].get(entry.key)?.delete(id);
      }

      this.data[collection].set(id, structuredClone(record));
      for (const entry of indexEntriesOf(record)) {
        const ids = this.indexes[entry.index].get(entry.key) ?? new Set<string>();
        ids.add(id);
        this.indexes[entry.index].set(entry.key, ids);
      }
    }
  }

  private sortedValues<C extends CollectionName>(collection: C): Array<CollectionMap[C]> {
    return [...this.data[collection].values()]
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map(record => structuredClone(record));
  }
}

function emptyIndexes(): Record<IndexName, Map<string, Set<string>>> {
  return { ip: new Map(), gateway: new Map(), endpoint: new Map() };
}
