import type {
  GraphCollections,
  HostRecord,
  InterfaceRecord,
  LinkRecord,
} from '../model/graph.js';
import type { ObservationRecord } from '../model/records.js';

export interface CollectionMap {
  hosts: HostRecord;
  interfaces: InterfaceRecord;
  links: LinkRecord;
  observations: ObservationRecord;
}

export type CollectionName = keyof CollectionMap;

export const COLLECTIONS: readonly CollectionName[] = ['hosts', 'interfaces', 'links', 'observations'];

/** Pending writes of one transaction, one map per collection. */
export type WriteSet = { [C in CollectionName]: Map<string, CollectionMap[C]> };

/** `ip`: claimed IP to interface; `gateway`: gateway IP to route; `endpoint`: interface to the links it anchors. */
export type IndexName = 'ip' | 'gateway' | 'endpoint';

export const INDEXES: readonly IndexName[] = ['ip', 'gateway', 'endpoint'];

export interface TransactionOptions {
  /** Lock owner and log correlation id; generated when absent. */
  owner?: string;
  /** Deadline for the whole unit of work, lock waits included. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Run the work, then discard its writes. */
  dryRun?: boolean;
}

/**
 * One unit of work against the graph. Every read and write first takes an
 * exclusive lock on the touched key, held until the transaction ends.
 */
export interface GraphTransaction {
  readonly owner: string;
  get<C extends CollectionName>(collection: C, id: string): Promise<CollectionMap[C] | undefined>;
  put<C extends CollectionName>(collection: C, record: CollectionMap[C]): Promise<void>;
  /** Take a set of keys up front, in sorted order. */
  lock(keys: Iterable<string>): Promise<void>;
  /** Ids of interfaces holding a claim on `ip`. */
  interfacesByIp(ip: string): Promise<string[]>;
  /** Ids of route links through gateway `ip`. */
  routesByGateway(ip: string): Promise<string[]>;
  /** Ids of links with `interfaceId` as an adjacency endpoint or route origin. */
  linksByEndpoint(interfaceId: string): Promise<string[]>;
  /** Throws when the transaction was cancelled or ran past its deadline. */
  checkpoint(): void;
}

export interface GraphStore {
  readonly driver: 'sqlite' | 'memory';
  transaction<T>(work: (tx: GraphTransaction) => Promise<T>, options?: TransactionOptions): Promise<T>;
  /** Consistent copy of every collection. */
  readAll(): Promise<GraphCollections>;
  getRecord<C extends CollectionName>(collection: C, id: string): Promise<CollectionMap[C] | undefined>;
  interfacesByIp(ip: string): Promise<InterfaceRecord[]>;
  count(): Promise<Record<CollectionName, number>>;
  /** Drop everything. Waits for running transactions. */
  reset(): Promise<void>;
  /** Replace the whole graph atomically. */
  load(data: GraphCollections): Promise<void>;
  close(): Promise<void>;
}

export function lockKey(collection: CollectionName | IndexName, id: string): string {
  return `${collection}/${id}`;
}

export function emptyWriteSet(): WriteSet {
  return {
    hosts: new Map(),
    interfaces: new Map(),
    links: new Map(),
    observations: new Map(),
  };
}
