import { z } from 'zod';
import type { HostMerge, IpConflict, MergeReport } from '../model/graph.js';

// ===== Configuration =====

const DAY_MS = 24 * 60 * 60 * 1000;

export const NetfuseConfigSchema = z.object({
  globalDir: z.string().optional(),
  store: z.object({
    driver: z.enum(['sqlite', 'memory']).default('sqlite'),
    /** SQLite file; defaults to `<globalDir>/graph.db`. */
    path: z.string().optional(),
    transactionTimeoutMs: z.number().int().positive().default(5000),
  }).default({}),
  ingest: z.object({
    maxConcurrentBatches: z.number().int().min(1).max(64).default(4),
    maxRetries: z.number().int().min(0).max(10).default(3),
    retryBaseDelayMs: z.number().int().min(0).default(100),
    retryMaxDelayMs: z.number().int().min(0).default(5000),
  }).default({}),
  topology: z.object({
    stalenessWindowMs: z.number().int().positive().default(7 * DAY_MS),
    /** Per-observation weight of the adjacency confidence track. */
    adjacencyBase: z.number().gt(0).lt(1).default(0.5),
    /** Per-observation weight of the route confidence track. */
    routeBase: z.number().gt(0).lt(1).default(0.3),
    /** Vantage hosts whose single report is enough to confirm a link. */
    trustedSources: z.array(z.string()).default([]),
    /** Background stale sweep period; 0 disables it. */
    sweepIntervalMs: z.number().int().min(0).default(0),
  }).default({}),
  ui: z.object({
    verbose: z.boolean().default(false),
  }).default({}),
});

export type NetfuseConfig = z.infer<typeof NetfuseConfigSchema>;
export type StoreConfig = NetfuseConfig['store'];
export type IngestConfig = NetfuseConfig['ingest'];
export type TopologyConfig = NetfuseConfig['topology'];

// ===== Events =====

export interface NetfuseEvents {
  'batch:started': { batchId: string; sourceHostId: string; records: number };
  'batch:committed': { report: MergeReport; durationMs: number };
  'batch:retry': { batchId: string; attempt: number; error: string };
  'batch:failed': { batchId: string; sourceHostId: string; error: Error };
  'host:merged': HostMerge;
  'identity:conflict': IpConflict;
  'link:stale': { linkIds: string[]; asOf: number };
  'store:corrupted': { error: Error };
}
