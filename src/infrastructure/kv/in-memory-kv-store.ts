/**
 * In-memory KeyValueStore.
 *
 * Entries expire on read, and every write sweeps out whatever has expired since
 * the last sweep, at most once per sweep interval. An optional value size
 * ceiling reproduces hosts whose option tables reject large rows.
 */
import type { KeyValueStore } from "$core/jobs/key-value-store";
import { log } from "$lib/log";
import { StorageError } from "$shared/errors";

interface Entry {
  value: string;
  expiresAt: number;
}

export interface InMemoryKeyValueStoreOptions {
  /** Millisecond clock. */
  clock?: () => number;
  maxValueBytes?: number;
  /** Minimum milliseconds between two sweeps, one minute by default. */
  sweepIntervalMs?: number;
}

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, Entry>();
  private readonly clock: () => number;
  private nextSweepAt = 0;

  constructor(private readonly options: InMemoryKeyValueStoreOptions = {}) {
    this.clock = options.clock ?? Date.now;
  }

  async get(key: string): Promise<string | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      log.trace("kv entry expired", { key });
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const size = Buffer.byteLength(value, "utf8");
    if (this.options.maxValueBytes !== undefined && size > this.options.maxValueBytes) {
      throw new StorageError(`Value for ${key} is ${size} bytes, the store accepts at most ${this.options.maxValueBytes}`, {
        key,
        size
      });
    }
    const now = this.clock();
    this.sweep(now);
    this.entries.set(key, { value, expiresAt: now + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  private sweep(now: number): void {
    if (now < this.nextSweepAt) {
      return;
    }
    this.nextSweepAt = now + (this.options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      log.debug(`kv sweep removed ${removed} expired entries`);
    }
  }

  /**
   * Number of stored entries, expired ones included until a read or a sweep drops them.
   */
  get size(): number {
    return this.entries.size;
  }
}
