/**
 * Async locking primitives for concurrent batch ingestion.
 * - AsyncRWLock: many transactions share the store, reset/load take it whole
 * - AsyncSemaphore: bounded worker pool for batches
 * - KeyedLock: per-entity exclusive locks with bounded waits
 */

import { LockTimeoutError } from './errors.js';

/**
 * AsyncRWLock: Reader-Writer lock.
 * Multiple readers can hold the lock simultaneously.
 * Writers get exclusive access (no readers or other writers).
 */
export class AsyncRWLock {
  private readers = 0;
  private writer = false;
  private readerQueue: Array<() => void> = [];
  private writerQueue: Array<() => void> = [];

  async acquireRead(): Promise<() => void> {
    if (!this.writer && this.writerQueue.length === 0) {
      this.readers++;
      return this.createReadRelease();
    }

    return new Promise<() => void>((resolve) => {
      // Accounting happens in processQueue, before the grant is delivered.
      this.readerQueue.push(() => resolve(this.createReadRelease()));
    });
  }

  async acquireWrite(): Promise<() => void> {
    if (!this.writer && this.readers === 0) {
      this.writer = true;
      return this.createWriteRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.writerQueue.push(() => resolve(this.createWriteRelease()));
    });
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createReadRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.readers--;
      this.processQueue();
    };
  }

  private createWriteRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.writer = false;
      this.processQueue();
    };
  }

  private processQueue(): void {
    // Queued writers go before new readers
    const nextWriter = this.writerQueue[0];
    if (this.readers === 0 && !this.writer && nextWriter) {
      this.writerQueue.shift();
      this.writer = true;
      queueMicrotask(nextWriter);
    } else if (!this.writer && this.writerQueue.length === 0 && this.readerQueue.length > 0) {
      const readers = [...this.readerQueue];
      this.readerQueue = [];
      this.readers += readers.length;
      for (const reader of readers) {
        queueMicrotask(reader);
      }
    }
  }
}

/**
 * AsyncSemaphore: Counting semaphore for bounded concurrency.
 */
export class AsyncSemaphore {
  private permits: number;
  private queue: Array<() => void> = [];

  constructor(maxPermits: number) {
    if (maxPermits < 1) throw new Error('Semaphore must have at least 1 permit');
    this.permits = maxPermits;
  }

  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push(() => {
        resolve(this.createRelease());
      });
    });
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.queue.shift();
      if (next) {
        queueMicrotask(next);
      } else {
        this.permits++;
      }
    };
  }
}

interface LockWaiter {
  owner: string;
  grant: () => void;
  timer: ReturnType<typeof setTimeout>;
}

interface LockEntry {
  owner: string;
  waiters: LockWaiter[];
}

/**
 * KeyedLock: exclusive locks keyed by entity id, owned by a transaction.
 *
 * Re-entrant for the same owner. Waiters are served FIFO and give up after
 * `timeoutMs` with a LockTimeoutError, so a cycle of waiting owners always
 * breaks instead of hanging.
 */
export class KeyedLock {
  private entries = new Map<string, LockEntry>();

  async acquire(key: string, owner: string, timeoutMs: number): Promise<void> {
    const entry = this.entries.get(key);
    if (!entry) {
      this.entries.set(key, { owner, waiters: [] });
      return;
    }
    if (entry.owner === owner) return;
    if (timeoutMs <= 0) throw new LockTimeoutError(key, 0);

    return new Promise<void>((resolve, reject) => {
      const waiter: LockWaiter = {
        owner,
        grant: resolve,
        timer: setTimeout(() => {
          entry.waiters = entry.waiters.filter(w => w !== waiter);
          reject(new LockTimeoutError(key, timeoutMs));
        }, timeoutMs),
      };
      entry.waiters.push(waiter);
    });
  }

  /** Release every listed key held by `owner`; keys held by others are ignored. */
  release(owner: string, keys: Iterable<string>): void {
    for (const key of keys) {
      const entry = this.entries.get(key);
      if (!entry || entry.owner !== owner) continue;

      const next = entry.waiters.shift();
      if (next) {
        clearTimeout(next.timer);
        entry.owner = next.owner;
        next.grant();
      } else {
        this.entries.delete(key);
      }
    }
  }
}
