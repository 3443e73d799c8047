import { z } from 'zod';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { NetfuseConfig } from '../core/types.js';
import { TopologyService } from '../service/topology-service.js';
import { MemoryGraphStore } from '../store/memory-store.js';
import { SqliteGraphStore } from '../store/sqlite-store.js';
import type { GraphStore } from '../store/types.js';

const GlobalOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  db: z.string().optional(),
  memory: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface CliContext {
  config: NetfuseConfig;
  service: TopologyService;
}

export function parseGlobalOptions(raw: unknown): GlobalOptions {
  return GlobalOptionsSchema.parse(raw);
}

/**
 * Open the configured store and wrap it in a service for the duration of
 * one command.
 */
export async function withService<T>(globals: GlobalOptions, fn: (ctx: CliContext) => Promise<T>): Promise<T> {
  if (globals.verbose) {
    setLogger(createLogger('netfuse', true));
  }

  const configManager = new ConfigManager();
  const config = configManager.load({
    store: {
      ...(globals.memory ? { driver: 'memory' } : {}),
      ...(globals.db ? { driver: 'sqlite', path: globals.db } : {}),
    },
    ...(globals.verbose ? { ui: { verbose: true } } : {}),
  });

  const store: GraphStore = config.store.driver === 'memory'
    ? new MemoryGraphStore({ transactionTimeoutMs: config.store.transactionTimeoutMs })
    : new SqliteGraphStore(configManager.resolveStorePath(), { transactionTimeoutMs: config.store.transactionTimeoutMs });

  const service = new TopologyService({ store, config });
  try {
    return await fn({ config, service });
  } finally {
    await service.close();
  }
}
