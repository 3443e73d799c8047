/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { NetfuseError } from '../core/errors.js';
import { createIngestCommand } from './commands/ingest.js';
import { createGraphCommand, createHostCommand, createOwnerCommand } from './commands/graph.js';
import {
  createAliasCommand,
  createExportCommand,
  createImportCommand,
  createSweepCommand,
} from './commands/manage.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Fuse ARP and routing table dumps from many hosts into one network topology graph')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--db <path>', 'SQLite graph store to use')
    .option('--memory', 'Use a throwaway in-memory graph store');

  // Register commands
  program.addCommand(createIngestCommand());
  program.addCommand(createGraphCommand());
  program.addCommand(createHostCommand());
  program.addCommand(createOwnerCommand());
  program.addCommand(createAliasCommand());
  program.addCommand(createSweepCommand());
  program.addCommand(createExportCommand());
  program.addCommand(createImportCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      const code = error instanceof NetfuseError ? ` [${error.code}]` : '';
      console.error(`\n  Error${code}: ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  }
}
