/**
 * Query commands.
 * `graph`: print the current topology
 * `host <id>`: show one host
 * `owner <ip>`: show the interface currently holding an IP
 */

import { Command } from 'commander';
import { NetfuseError } from '../../core/errors.js';
import type { InterfaceRecord } from '../../model/graph.js';
import { parseGlobalOptions, withService } from '../context.js';
import { formatHost, formatInterface, formatSnapshot } from '../format.js';

export function createGraphCommand(): Command {
  return new Command('graph')
    .description('Print the fused topology graph')
    .option('--include-stale', 'Include links that went stale')
    .option('--min-confidence <n>', 'Hide links below this confidence', '0')
    .option('--json', 'Output the snapshot as JSON')
    .action(async (options: { includeStale?: boolean; minConfidence: string; json?: boolean }, command: Command) => {
      const minConfidence = Number(options.minConfidence);
      if (!Number.isFinite(minConfidence) || minConfidence < 0 || minConfidence > 1) {
        throw new NetfuseError(`--min-confidence must be between 0 and 1, got ${options.minConfidence}`, 'INVALID_ARGUMENT', 'query');
      }

      await withService(parseGlobalOptions(command.optsWithGlobals()), async ({ service }) => {
        const snapshot = await service.getGraph({ includeStale: options.includeStale ?? false, minConfidence });
        if (options.json) {
          console.log(JSON.stringify(snapshot, null, 2));
          return;
        }
        for (const line of formatSnapshot(snapshot)) console.log(line);
      });
    });
}

export function createHostCommand(): Command {
  return new Command('host')
    .description('Show one host; absorbed ids resolve to the surviving host')
    .argument('<id>', 'Host id')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: { json?: boolean }, command: Command) => {
      await withService(parseGlobalOptions(command.optsWithGlobals()), async ({ service }) => {
        const host = await service.getHost(id);
        if (options.json) {
          console.log(JSON.stringify(host, null, 2));
          return;
        }
        const interfaces = new Map<string, InterfaceRecord>();
        for (const interfaceId of host.interfaceIds) {
          interfaces.set(interfaceId, await service.getInterface(interfaceId));
        }
        console.log();
        for (const line of formatHost(host, interfaces)) console.log(line);
        console.log();
      });
    });
}

export function createOwnerCommand(): Command {
  return new Command('owner')
    .description('Show the interface that most recently claimed an IP')
    .argument('<ip>', 'IP address')
    .option('--json', 'Output as JSON')
    .action(async (ip: string, options: { json?: boolean }, command: Command) => {
      await withService(parseGlobalOptions(command.optsWithGlobals()), async ({ service }) => {
        const owner = await service.currentOwner(ip);
        if (options.json) {
          console.log(JSON.stringify(owner ?? null, null, 2));
          return;
        }
        if (!owner) {
          console.log(`\n  No interface is known to hold ${ip}.\n`);
          return;
        }
        console.log(`\n  ${formatInterface(owner)}`);
        console.log(`  host ${owner.hostId}\n`);
      });
    });
}
