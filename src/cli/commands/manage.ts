/**
 * Graph maintenance commands.
 * `alias <source> <target> [--link-address]`: declare two identities one machine
 * `sweep`: persist staleness on uncorroborated links
 * `export <file>`: write the persisted graph as JSON
 * `import <file>`: replace the graph with an export
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { NetfuseError, StoreCorruptionError, toError } from '../../core/errors.js';
import { backupFile, writeFileSafe } from '../../utils/fs.js';
import { parseGlobalOptions, withService } from '../context.js';
import { formatReport } from '../format.js';

function parseTimestamp(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const ms = Date.parse(value);
  if (!Number.isFinite(ms)) {
    throw new NetfuseError(`Invalid ${flag} timestamp: ${value}`, 'INVALID_ARGUMENT', 'query');
  }
  return ms;
}

export function createAliasCommand(): Command {
  return new Command('alias')
    .description('Declare that <target> (a host id, or a link address with --link-address) is the same machine as <source>')
    .argument('<source>', 'Vantage host id')
    .argument('<target>', 'Another vantage host id, or a link address of <source>')
    .option('--link-address', 'Read <target> as a link address of <source>')
    .option('--observed-at <iso>', 'When the aliasing was established')
    .option('--json', 'Output the merge report as JSON')
    .action(async (source: string, target: string, options: { linkAddress?: boolean; observedAt?: string; json?: boolean }, command: Command) => {
      const observedAt = parseTimestamp(options.observedAt, '--observed-at');
      await withService(parseGlobalOptions(command.optsWithGlobals()), async ({ service }) => {
        const report = await service.alias(source, options.linkAddress ? { linkAddress: target } : { hostId: target }, observedAt);
        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }
        for (const line of formatReport(report)) console.log(line);
      });
    });
}

export function createSweepCommand(): Command {
  return new Command('sweep')
    .description('Mark links with no corroboration inside the staleness window as stale')
    .option('--as-of <iso>', 'Reference time (defaults to now)')
    .action(async (options: { asOf?: string }, command: Command) => {
      const asOf = parseTimestamp(options.asOf, '--as-of');
      await withService(parseGlobalOptions(command.optsWithGlobals()), async ({ service }) => {
        const swept = await service.sweepStale(asOf);
        console.log(`\n  ${swept.length} link(s) marked stale.\n`);
      });
    });
}

export function createExportCommand(): Command {
  return new Command('export')
    .description('Write the persisted graph to a JSON file (the previous file is kept as <file>.bak)')
    .argument('<file>', 'Output file')
    .action(async (file: string, _options: Record<string, never>, command: Command) => {
      const path = resolve(file);
      await withService(parseGlobalOptions(command.optsWithGlobals()), async ({ service }) => {
        const graph = await service.exportGraph();
        const backup = backupFile(path);
        writeFileSafe(path, JSON.stringify(graph, null, 2) + '\n');
        console.log(`\n  Exported ${graph.hosts.length} hosts, ${graph.links.length} links to ${path}`);
        if (backup) console.log(`  Previous file kept as ${backup}`);
        console.log();
      });
    });
}

export function createImportCommand(): Command {
  return new Command('import')
    .description('Replace the stored graph with a JSON export')
    .argument('<file>', 'Export file')
    .action(async (file: string, _options: Record<string, never>, command: Command) => {
      const path = resolve(file);
      let data: unknown;
      try {
        data = JSON.parse(readFileSync(path, 'utf-8'));
      } catch (err) {
        throw new StoreCorruptionError(`Cannot read graph export ${path}`, toError(err));
      }

      await withService(parseGlobalOptions(command.optsWithGlobals()), async ({ service }) => {
        const graph = await service.importGraph(data);
        console.log(`\n  Imported ${graph.hosts.length} hosts, ${graph.interfaces.length} interfaces, ${graph.links.length} links.\n`);
      });
    });
}
