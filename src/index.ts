/**
 * netfuse: identity resolution and topology fusion for network dumps
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { TopologyService, MemoryGraphStore } from 'netfuse';
 *
 * const service = new TopologyService({ store: new MemoryGraphStore() });
 * const report = await service.ingest('10.0.0.5', [
 *   { kind: 'arp', observedAt: Date.now(), localInterface: 'eth0', neighborIp: '10.0.0.1', neighborLinkAddress: '52:54:00:12:35:02' },
 * ]);
 * const graph = await service.getGraph();
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager } from './core/config.js';
export { getLogger, setLogger, createLogger } from './core/logger.js';
export { AsyncRWLock, AsyncSemaphore, KeyedLock } from './core/mutex.js';
export {
  NetfuseError,
  ConfigError,
  DumpParseError,
  StoreTransactionError,
  StoreCorruptionError,
  LockTimeoutError,
  IngestCancelledError,
  NotFoundError,
  type ErrorStage,
} from './core/errors.js';
export {
  NetfuseConfigSchema,
  type NetfuseConfig,
  type StoreConfig,
  type IngestConfig,
  type TopologyConfig,
  type NetfuseEvents,
} from './core/types.js';

// Model
export type * from './model/records.js';
export type * from './model/graph.js';
export {
  parseIp,
  parseCidr,
  canonicalLinkAddress,
  formatLinkAddress,
  type IpAddress,
  type Cidr,
} from './model/address.js';

// Pipeline
export { normalize, normalizeBatch, type NormalizedBatch } from './normalizer/normalizer.js';
export { DisjointSet } from './identity/disjoint-set.js';
export { IdentityResolver, pickOwner, conflictFor } from './identity/resolver.js';
export { FusionEngine, type BatchOutcome } from './topology/fusion-engine.js';
export { confidenceFor, evidenceStatus, effectiveStatus } from './topology/confidence.js';
export { buildSnapshot } from './topology/snapshot.js';

// Store
export { MemoryGraphStore } from './store/memory-store.js';
export { SqliteGraphStore } from './store/sqlite-store.js';
export { TransactionalGraphStore, type StoreOptions } from './store/transactional-store.js';
export { PersistedGraphSchema, type PersistedGraph } from './store/persisted.js';
export type { GraphStore, GraphTransaction, TransactionOptions, CollectionName } from './store/types.js';

// Service
export { TopologyService, type TopologyServiceOptions, type IngestOptions } from './service/topology-service.js';

// Parsers
export { parseDump, guessDumpType, type ParsedDump, type DumpType, type DumpOs } from './parsers/index.js';

// CLI
export { createCLI, main } from './cli/index.js';
export { VERSION, NAME } from './version.js';
