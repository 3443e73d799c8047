/**
 * `netfuse ingest <dumpfile>`: parse a host dump and fuse it into the graph.
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { DumpParseError } from '../../core/errors.js';
import { DUMP_OSES, DUMP_TYPES, isDumpOs, isDumpType, parseDump } from '../../parsers/index.js';
import { fileMtime } from '../../utils/fs.js';
import { parseGlobalOptions, withService } from '../context.js';
import { formatReport } from '../format.js';

interface IngestFlags {
  type?: string;
  os?: string;
  ip?: string;
  source?: string;
  observedAt?: string;
  force?: boolean;
  dryRun?: boolean;
  json?: boolean;
}

export function createIngestCommand(): Command {
  const cmd = new Command('ingest');

  cmd
    .description('Fuse an ARP or routing table dump into the topology graph')
    .argument('<dumpfile>', 'Dump file taken on one host')
    .addOption(new Option('-t, --type <type>', 'Dump type').choices([...DUMP_TYPES]))
    .addOption(new Option('-o, --os <os>', 'Operating system the dump came from').choices([...DUMP_OSES]))
    .option('-i, --ip <address>', 'IP of the host the dump was taken on')
    .option('-s, --source <hostId>', 'Vantage host id (defaults to the centre IP)')
    .option('--observed-at <iso>', 'When the dump was taken (defaults to the file modification time)')
    .option('-f, --force', 'Drop and rebuild the graph store before ingesting')
    .option('-n, --dry-run', 'Process the dump but save nothing')
    .option('--json', 'Output the merge report as JSON')
    .action(async (dumpfile: string, options: IngestFlags, command: Command) => {
      await ingestDump(dumpfile, options, command);
    });

  return cmd;
}

async function ingestDump(dumpfile: string, options: IngestFlags, command: Command): Promise<void> {
  const path = resolve(dumpfile);
  const text = readFileSync(path, 'utf-8');
  const observedAt = options.observedAt === undefined ? fileMtime(path) : Date.parse(options.observedAt);
  if (!Number.isFinite(observedAt)) {
    throw new DumpParseError(`Invalid --observed-at timestamp: ${options.observedAt ?? ''}`);
  }

  const dump = parseDump(text, {
    type: options.type !== undefined && isDumpType(options.type) ? options.type : undefined,
    os: options.os !== undefined && isDumpOs(options.os) ? options.os : undefined,
    ip: options.ip,
    observedAt,
  });

  const source = options.source ?? dump.sourceIp;
  if (!source) {
    throw new DumpParseError('Cannot tell which host the dump was taken on; pass --source or --ip');
  }

  await withService(parseGlobalOptions(command.optsWithGlobals()), async ({ service }) => {
    const report = await service.ingest(source, dump.records, {
      forceRecreate: options.force ?? false,
      dryRun: options.dryRun ?? false,
    });

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    console.log(`\n  Parsed ${dump.type} dump (${dump.os}): ${dump.records.length} records, ${dump.skipped} skipped`);
    for (const line of formatReport(report)) console.log(line);
  });
}
