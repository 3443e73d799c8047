import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { NetfuseConfigSchema, type NetfuseConfig } from './types.js';
import { ConfigError, toError } from './errors.js';

type RawConfig = Record<string, unknown>;

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: NetfuseConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir || join(homedir(), '.netfuse');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: RawConfig): NetfuseConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.netfuse.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = NetfuseConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${parsed.error.message}`, parsed.error);
    }

    this.config = { ...parsed.data, globalDir: parsed.data.globalDir ?? this.globalDir };
    return this.config;
  }

  get(): NetfuseConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  /** Path of the SQLite graph file for the loaded configuration. */
  resolveStorePath(): string {
    const config = this.get();
    return config.store.path ?? join(config.globalDir ?? this.globalDir, 'graph.db');
  }

  private readYaml(path: string, scope: string): RawConfig {
    if (!existsSync(path)) return {};

    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isPlainObject(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${scope} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const env = process.env;
    const store: RawConfig = isPlainObject(raw.store) ? { ...raw.store } : {};
    const ingest: RawConfig = isPlainObject(raw.ingest) ? { ...raw.ingest } : {};
    const topology: RawConfig = isPlainObject(raw.topology) ? { ...raw.topology } : {};
    const ui: RawConfig = isPlainObject(raw.ui) ? { ...raw.ui } : {};

    if (env.NETFUSE_STORE_DRIVER) {
      store.driver = env.NETFUSE_STORE_DRIVER;
    }
    if (env.NETFUSE_STORE_PATH) {
      store.path = env.NETFUSE_STORE_PATH;
    }
    if (env.NETFUSE_MAX_CONCURRENT_BATCHES) {
      ingest.maxConcurrentBatches = Number(env.NETFUSE_MAX_CONCURRENT_BATCHES);
    }
    if (env.NETFUSE_MAX_RETRIES) {
      ingest.maxRetries = Number(env.NETFUSE_MAX_RETRIES);
    }
    if (env.NETFUSE_STALENESS_WINDOW_MS) {
      topology.stalenessWindowMs = Number(env.NETFUSE_STALENESS_WINDOW_MS);
    }
    if (env.NETFUSE_TRUSTED_SOURCES) {
      topology.trustedSources = env.NETFUSE_TRUSTED_SOURCES.split(',').map(s => s.trim()).filter(Boolean);
    }
    if (env.NETFUSE_VERBOSE) {
      ui.verbose = env.NETFUSE_VERBOSE === '1' || env.NETFUSE_VERBOSE === 'true';
    }

    return { ...raw, store, ingest, topology, ui };
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const current = target[key];
      if (isPlainObject(incoming) && isPlainObject(current)) {
        result[key] = this.deepMerge(current, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}
