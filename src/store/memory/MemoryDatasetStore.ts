import type { Instant } from '../../types/ids.js';
import type { DatasetEntry, DatasetStore, SetOptions } from '../DatasetStore.js';
import { nowInstant } from '../../utils/time.js';
import { ConfigError } from '../../errors.js';

export interface MemoryDatasetStoreOptions {
  now?: () => Instant;
}

export class MemoryDatasetStore implements DatasetStore {
  private readonly entries = new Map<string, DatasetEntry>();
  private readonly nowFn: () => Instant;

  constructor(options: MemoryDatasetStoreOptions = {}) {
    this.nowFn = options.now ?? nowInstant;
  }

  set(key: string, value: unknown, options: SetOptions = {}): void {
    this.entries.set(key, { key, value, broadcast: options.broadcast ?? false, updatedAt: this.nowFn() });
  }

  append(key: string, value: unknown): void {
    const existing = this.entries.get(key);
    if (!existing) {
      this.entries.set(key, { key, value: [value], broadcast: false, updatedAt: this.nowFn() });
      return;
    }
    if (!Array.isArray(existing.value)) {
      throw new ConfigError(`Dataset '${key}' is not a list`);
    }
    existing.value.push(value);
    existing.updatedAt = this.nowFn();
  }

  get(key: string): unknown {
    return this.entries.get(key)?.value;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  isBroadcast(key: string): boolean {
    return this.entries.get(key)?.broadcast ?? false;
  }

  entry(key: string): DatasetEntry | undefined {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }

  keys(prefix = ''): string[] {
    return [...this.entries.keys()].filter((key) => key.startsWith(prefix)).sort();
  }
}
