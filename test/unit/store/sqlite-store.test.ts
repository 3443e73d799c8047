import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { SqliteGraphStore } from '../../../src/store/sqlite-store.js';
import type { HostRecord } from '../../../src/model/graph.js';
import { StoreCorruptionError } from '../../../src/core/errors.js';

function host(id: string): HostRecord {
  return { id, seed: `src:${id}`, interfaceIds: [], labels: [], firstSeen: 1, lastSeen: 2, provenance: ['obs-1'], mergedFrom: [], mergedInto: null };
}

describe('SqliteGraphStore', () => {
  let dir: string;
  let dbPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'netfuse-sqlite-'));
    dbPath = join(dir, 'nested', 'graph.db');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should create its directory and keep data across reopen', async () => {
    const first = new SqliteGraphStore(dbPath);
    await first.transaction(async tx => tx.put('hosts', host('host-a')));
    await first.close();

    const second = new SqliteGraphStore(dbPath);
    expect(second.path).toBe(dbPath);
    expect(await second.getRecord('hosts', 'host-a')).toEqual(host('host-a'));
    await second.close();
  });

  it('should report rows that are not valid JSON as corruption', async () => {
    const store = new SqliteGraphStore(dbPath);
    await store.transaction(async tx => tx.put('hosts', host('host-a')));
    await store.close();

    const raw = new Database(dbPath);
    raw.prepare(`UPDATE hosts SET data = '{broken' WHERE id = 'host-a'`).run();
    raw.close();

    const reopened = new SqliteGraphStore(dbPath);
    await expect(reopened.getRecord('hosts', 'host-a')).rejects.toBeInstanceOf(StoreCorruptionError);
    await expect(reopened.readAll()).rejects.toThrow(/not valid JSON/);
    await reopened.close();
  });

  it('should report rows that do not match the schema as corruption', async () => {
    const store = new SqliteGraphStore(dbPath);
    await store.close();

    const raw = new Database(dbPath);
    raw.prepare(`INSERT INTO hosts (id, data) VALUES ('host-b', ?)`).run(JSON.stringify({ id: 'host-b', seed: 1 }));
    raw.prepare(`INSERT INTO hosts (id, data) VALUES ('host-c', ?)`).run(JSON.stringify(host('host-d')));
    raw.close();

    const reopened = new SqliteGraphStore(dbPath);
    await expect(reopened.getRecord('hosts', 'host-b')).rejects.toThrow(/does not match the schema/);
    await expect(reopened.getRecord('hosts', 'host-c')).rejects.toThrow(/carries id host-d/);
    await reopened.close();
  });

  it('should refuse an unknown schema version', async () => {
    const store = new SqliteGraphStore(dbPath);
    await store.close();

    const raw = new Database(dbPath);
    raw.prepare(`UPDATE meta SET value = '99' WHERE key = 'schema_version'`).run();
    raw.close();

    expect(() => new SqliteGraphStore(dbPath)).toThrow(StoreCorruptionError);
  });
});
