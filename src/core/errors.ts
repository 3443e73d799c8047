export type ErrorStage = 'config' | 'parse' | 'normalize' | 'resolve' | 'fuse' | 'store' | 'query';

export class NetfuseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: ErrorStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'NetfuseError';
  }
}

export class ConfigError extends NetfuseError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class DumpParseError extends NetfuseError {
  constructor(message: string, public readonly line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`, 'PARSE_ERROR', 'parse');
    this.name = 'DumpParseError';
  }
}

/**
 * Transient store failure: lock wait or transaction timeout, busy database.
 * The batch that raised it is retried with backoff.
 */
export class StoreTransactionError extends NetfuseError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORE_TRANSACTION', 'store', cause);
    this.name = 'StoreTransactionError';
  }
}

/**
 * The persisted graph cannot be trusted any more. Never retried; the
 * service refuses further ingestion once one has been seen.
 */
export class StoreCorruptionError extends NetfuseError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORE_CORRUPTION', 'store', cause);
    this.name = 'StoreCorruptionError';
  }
}

export class LockTimeoutError extends NetfuseError {
  constructor(public readonly key: string, public readonly waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for lock on ${key}`, 'LOCK_TIMEOUT', 'store');
    this.name = 'LockTimeoutError';
  }
}

export class IngestCancelledError extends NetfuseError {
  constructor(public readonly batchId: string) {
    super(`Batch ${batchId} was cancelled before commit`, 'INGEST_CANCELLED', 'store');
    this.name = 'IngestCancelledError';
  }
}

export class NotFoundError extends NetfuseError {
  constructor(public readonly entity: string, public readonly id: string) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND', 'query');
    this.name = 'NotFoundError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
