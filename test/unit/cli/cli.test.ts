import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createCLI, main } from '../../../src/cli/index.js';
import { hostIdFor, interfaceIdFor } from '../../../src/model/ids.js';

const DUMP = `Address                  HWtype  HWaddress           Flags Mask            Iface
192.168.1.1              ether   aa:bb:cc:00:00:01   C                     eth0
192.168.1.20             ether   aa:bb:cc:00:00:14   C                     eth0
`;

describe('CLI', () => {
  let dir: string;
  let dumpPath: string;
  const output: string[] = [];
  const errors: string[] = [];

  const run = (...args: string[]) => main(['node', 'netfuse', ...args]);
  const printed = (): string[] => [...output];
  const clearOutput = () => {
    output.length = 0;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'netfuse-cli-'));
    dumpPath = join(dir, 'arp.txt');
    writeFileSync(dumpPath, DUMP);
    output.length = 0;
    errors.length = 0;
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(String(args[0] ?? ''));
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(String(args[0] ?? ''));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  it('should register every command', () => {
    const names = createCLI().commands.map(cmd => cmd.name());
    expect(names).toEqual(['ingest', 'graph', 'host', 'owner', 'alias', 'sweep', 'export', 'import']);
  });

  it('should ingest a dump and print the merge report as JSON', async () => {
    await run('--memory', 'ingest', dumpPath, '--ip', '192.168.1.10', '--observed-at', '2024-01-01T00:00:00Z', '--json');

    expect(process.exitCode).toBeUndefined();
    const report = JSON.parse(printed()[0]);
    expect(report).toMatchObject({ sourceHostId: '192.168.1.10', accepted: 2, rejected: 0, dryRun: false });
    expect(report.created.links).toHaveLength(2);
  });

  it('should print a readable report without --json', async () => {
    await run('--memory', 'ingest', dumpPath, '--ip', '192.168.1.10', '--source', 'edge-1', '--dry-run');
    const lines = printed();
    expect(lines[0]).toBe('\n  Parsed arp dump (linux): 2 records, 0 skipped');
    expect(lines).toContain('  Source:     edge-1');
    expect(lines).toContain('  Created:    3 hosts, 3 interfaces, 2 links');
  });

  it('should fail with the error code when the centre IP is missing', async () => {
    await run('--memory', 'ingest', dumpPath);
    expect(process.exitCode).toBe(1);
    expect(errors[0]).toContain('Error [PARSE_ERROR]: Linux ARP dumps do not contain the IP of the centre host');
  });

  it('should validate --min-confidence', async () => {
    await run('--memory', 'graph', '--min-confidence', '3');
    expect(process.exitCode).toBe(1);
    expect(errors[0]).toContain('Error [INVALID_ARGUMENT]: --min-confidence must be between 0 and 1, got 3');
  });

  it('should say when no interface holds an IP', async () => {
    await run('--memory', 'owner', '10.9.9.9');
    expect(printed()).toEqual(['\n  No interface is known to hold 10.9.9.9.\n']);
  });

  it('should read the alias target as a link address only with --link-address', async () => {
    await run('--memory', 'alias', 'r1', 'deadbeefcafe', '--json');
    const byHost = JSON.parse(printed()[0]);
    expect(byHost.created).toEqual({ hosts: [hostIdFor('src:r1'), hostIdFor('src:deadbeefcafe')].sort(), interfaces: [], links: [] });

    clearOutput();
    await run('--memory', 'alias', 'r1', 'deadbeefcafe', '--link-address', '--json');
    expect(JSON.parse(printed()[0]).created.interfaces).toEqual([interfaceIdFor('mac:deadbeefcafe')]);
  });

  it('should keep state in a SQLite file across commands and round-trip exports', async () => {
    const db = join(dir, 'graph.db');
    const other = join(dir, 'other.db');
    const exportPath = join(dir, 'export.json');

    await run('--db', db, 'ingest', dumpPath, '--ip', '192.168.1.10', '--observed-at', '2024-01-01T00:00:00Z');
    await run('--db', db, 'alias', '192.168.1.10', 'edge-1', '--observed-at', '2024-01-01T00:00:00Z', '--json');
    const alias = JSON.parse(printed()[printed().length - 1]);
    expect(alias.mergedHosts).toHaveLength(1);

    await run('--db', db, 'export', exportPath);
    expect(JSON.parse(readFileSync(exportPath, 'utf-8'))).toMatchObject({ version: 2 });
    await run('--db', db, 'export', exportPath);
    expect(existsSync(`${exportPath}.bak`)).toBe(true);

    await run('--db', other, 'import', exportPath);
    clearOutput();
    await run('--db', other, 'host', hostIdFor('src:edge-1'), '--json');
    const host = JSON.parse(printed()[0]);
    expect(host.labels.map((label: { value: string }) => label.value)).toEqual(['192.168.1.10', 'edge-1']);

    clearOutput();
    await run('--db', other, 'owner', '192.168.1.1', '--json');
    expect(JSON.parse(printed()[0])).toMatchObject({ linkAddress: 'aabbcc000001' });

    clearOutput();
    await run('--db', other, 'sweep', '--as-of', '2024-02-01T00:00:00Z');
    expect(printed()).toEqual(['\n  2 link(s) marked stale.\n']);
    expect(process.exitCode).toBeUndefined();
  });
});
