/**
 * SQLite-backed graph store.
 * One JSON row per entity plus lookup tables (IP claims, route gateways,
 * link endpoints) kept in step with the entity rows inside every commit.
 */

import Database from 'better-sqlite3';
import type { ZodType } from 'zod';
import { dirname } from 'path';
import { StoreCorruptionError, StoreTransactionError, toError } from '../core/errors.js';
import type { GraphCollections } from '../model/graph.js';
import { ensureDirSync } from '../utils/fs.js';
import {
  HostRecordSchema,
  InterfaceRecordSchema,
  LinkRecordSchema,
  ObservationRecordSchema,
  PERSISTED_VERSION,
} from './persisted.js';
import { TransactionalGraphStore, indexEntriesOf } from './transactional-store.js';
import type { StoreOptions } from './transactional-store.js';
import { COLLECTIONS } from './types.js';
import type { CollectionMap, CollectionName, IndexName, WriteSet } from './types.js';

const SCHEMAS: { [C in CollectionName]: ZodType<CollectionMap[C]> } = {
  hosts: HostRecordSchema,
  interfaces: InterfaceRecordSchema,
  links: LinkRecordSchema,
  observations: ObservationRecordSchema,
};

const INDEX_TABLES: Record<IndexName, { table: string; keyColumn: string; idColumn: string }> = {
  ip: { table: 'interface_ips', keyColumn: 'ip', idColumn: 'interface_id' },
  gateway: { table: 'link_gateways', keyColumn: 'gateway', idColumn: 'link_id' },
  endpoint: { table: 'link_endpoints', keyColumn: 'interface_id', idColumn: 'link_id' },
};

const INDEXES_OF: Partial<Record<CollectionName, IndexName[]>> = {
  interfaces: ['ip'],
  links: ['gateway', 'endpoint'],
};

const TRANSIENT_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_BUSY_SNAPSHOT']);
const CORRUPT_CODES = new Set(['SQLITE_CORRUPT', 'SQLITE_NOTADB', 'SQLITE_FORMAT']);

export class SqliteGraphStore extends TransactionalGraphStore {
  readonly driver = 'sqlite';
  private db: Database.Database;

  constructor(private readonly dbPath: string, options: StoreOptions = {}) {
    super(options);
    this.db = openDatabase(dbPath, options.transactionTimeoutMs ?? 5000);
    try {
      this.run(() => this.createSchema());
    } catch (err) {
      this.db.close();
      throw err;
    }
  }

  get path(): string {
    return this.dbPath;
  }

  private createSchema(): void {
    for (const collection of COLLECTIONS) {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS ${collection} (
          id TEXT PRIMARY KEY,
          data TEXT NOT NULL
        )
      `);
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS interface_ips (
        ip TEXT NOT NULL,
        interface_id TEXT NOT NULL,
        PRIMARY KEY (ip, interface_id)
      );
      CREATE TABLE IF NOT EXISTS link_gateways (
        gateway TEXT NOT NULL,
        link_id TEXT NOT NULL,
        PRIMARY KEY (gateway, link_id)
      );
      CREATE TABLE IF NOT EXISTS link_endpoints (
        interface_id TEXT NOT NULL,
        link_id TEXT NOT NULL,
        PRIMARY KEY (interface_id, link_id)
      );
      CREATE INDEX IF NOT EXISTS interface_ips_by_interface ON interface_ips (interface_id);
      CREATE INDEX IF NOT EXISTS link_gateways_by_link ON link_gateways (link_id);
      CREATE INDEX IF NOT EXISTS link_endpoints_by_link ON link_endpoints (link_id);
      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);

    const version: unknown = this.db.prepare(`SELECT value FROM meta WHERE key = 'schema_version'`).pluck().get();
    if (version === undefined) {
      this.db.prepare(`INSERT INTO meta (key, value) VALUES ('schema_version', ?)`).run(String(PERSISTED_VERSION));
    } else if (version !== String(PERSISTED_VERSION)) {
      throw new StoreCorruptionError(`Unsupported graph store schema version: ${String(version)}`);
    }
  }

  protected readRecord<C extends CollectionName>(collection: C, id: string): CollectionMap[C] | undefined {
    const row: unknown = this.run(() => this.db.prepare(`SELECT data FROM ${collection} WHERE id = ?`).pluck().get(id));
    if (row === undefined) return undefined;
    return this.decode(collection, id, row);
  }

  protected readIndex(index: IndexName, key: string): string[] {
    const { table, keyColumn, idColumn } = INDEX_TABLES[index];
    const rows: unknown[] = this.run(() =>
      this.db.prepare(`SELECT ${idColumn} FROM ${table} WHERE ${keyColumn} = ? ORDER BY ${idColumn}`).pluck().all(key),
    );
    return rows.filter((value): value is string => typeof value === 'string');
  }

  protected applyWrites(writes: WriteSet, replace: boolean): void {
    const commit = this.db.transaction(() => {
      if (replace) {
        for (const collection of COLLECTIONS) this.db.exec(`DELETE FROM ${collection}`);
        for (const { table } of Object.values(INDEX_TABLES)) this.db.exec(`DELETE FROM ${table}`);
      }
      this.writeCollection('hosts', writes);
      this.writeCollection('interfaces', writes);
      this.writeCollection('links', writes);
      this.writeCollection('observations', writes);
    });

    this.run(() => commit.immediate());
  }

  protected readCollections(): GraphCollections {
    const snapshot = this.db.transaction(() => ({
      hosts: this.readTable('hosts'),
      interfaces: this.readTable('interfaces'),
      links: this.readTable('links'),
      observations: this.readTable('observations'),
    }));
    return this.run(() => snapshot.deferred());
  }

  protected countRecords(): Record<CollectionName, number> {
    const counts = { hosts: 0, interfaces: 0, links: 0, observations: 0 };
    for (const collection of COLLECTIONS) {
      const value: unknown = this.run(() => this.db.prepare(`SELECT COUNT(*) FROM ${collection}`).pluck().get());
      counts[collection] = typeof value === 'number' ? value : 0;
    }
    return counts;
  }

  protected closeBackend(): void {
    this.db.close();
  }

  private writeCollection<C extends CollectionName>(collection: C, writes: WriteSet): void {
    const upsert = this.db.prepare(`INSERT OR REPLACE INTO ${collection} (id, data) VALUES (?, ?)`);
    const indexes = INDEXES_OF[collection] ?? [];
    for (const [id, record] of writes[collection]) {
      upsert.run(id, JSON.stringify(record));
      for (const index of indexes) {
        const { table, idColumn } = INDEX_TABLES[index];
        this.db.prepare(`DELETE FROM ${table} WHERE ${idColumn} = ?`).run(id);
      }
      for (const entry of indexEntriesOf(record)) {
        const { table, keyColumn, idColumn } = INDEX_TABLES[entry.index];
        this.db.prepare(`INSERT OR IGNORE INTO ${table} (${keyColumn}, ${idColumn}) VALUES (?, ?)`).run(entry.key, id);
      }
    }
  }

  private readTable<C extends CollectionName>(collection: C): Array<CollectionMap[C]> {
    const rows: unknown[] = this.db.prepare(`SELECT id, data FROM ${collection} ORDER BY id`).all();
    return rows.map(row => {
      if (typeof row !== 'object' || row === null || !('id' in row) || !('data' in row)) {
        throw new StoreCorruptionError(`Malformed row in ${collection}`);
      }
      return this.decode(collection, String(row.id), row.data);
    });
  }

  private decode<C extends CollectionName>(collection: C, id: string, raw: unknown): CollectionMap[C] {
    if (typeof raw !== 'string') {
      throw new StoreCorruptionError(`Row ${collection}/${id} holds no JSON text`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreCorruptionError(`Row ${collection}/${id} is not valid JSON`, toError(err));
    }

    const parsed = SCHEMAS[collection].safeParse(json);
    if (!parsed.success) {
      throw new StoreCorruptionError(`Row ${collection}/${id} does not match the schema: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    if (parsed.data.id !== id) {
      throw new StoreCorruptionError(`Row ${collection}/${id} carries id ${parsed.data.id}`);
    }
    return parsed.data;
  }

  private run<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw translateError(err, 'Graph store operation failed');
    }
  }
}

function openDatabase(dbPath: string, busyTimeoutMs: number): Database.Database {
  try {
    if (dbPath !== ':memory:') ensureDirSync(dirname(dbPath));
    const db = new Database(dbPath);

    // WAL lets readers in other processes see the last committed batch
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.pragma(`busy_timeout = ${busyTimeoutMs}`);
    return db;
  } catch (err) {
    throw translateError(err, `Cannot open graph store at ${dbPath}`);
  }
}

function sqliteCode(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

/** Map driver failures onto the store error taxonomy. */
function translateError(err: unknown, context: string): Error {
  if (err instanceof StoreCorruptionError || err instanceof StoreTransactionError) return err;

  const error = toError(err);
  const code = sqliteCode(err);
  if (code !== null && TRANSIENT_CODES.has(code)) {
    return new StoreTransactionError(`${context}: ${error.message}`, error);
  }
  if (code !== null && CORRUPT_CODES.has(code)) {
    return new StoreCorruptionError(`${context}: ${error.message}`, error);
  }
  return error;
}
