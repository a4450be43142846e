import type { Instant } from '../types/ids.js';

export interface DatasetEntry {
  key: string;
  value: unknown;
  broadcast: boolean;
  updatedAt: Instant;
}

export interface SetOptions {
  broadcast?: boolean;
}

/**
 * Key/value store for scan output. `append` grows an array value; a key appended to
 * for the first time starts as an empty array.
 */
export interface DatasetStore {
  set(key: string, value: unknown, options?: SetOptions): void;
  append(key: string, value: unknown): void;
  get(key: string): unknown;
  has(key: string): boolean;
  isBroadcast(key: string): boolean;
  entry(key: string): DatasetEntry | undefined;
  keys(prefix?: string): string[];
}
