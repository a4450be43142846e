import type { ResultSink } from '../types/sink.js';
import type { DatasetStore } from './DatasetStore.js';

export class DatasetAppendSink<T = unknown> implements ResultSink<T> {
  constructor(private readonly store: DatasetStore, readonly key: string) {}

  push(value: T): void {
    this.store.append(this.key, value);
  }
}

/**
 * Replaces the dataset with every push and marks it for broadcast.
 */
export class DatasetBroadcastSink<T = unknown> implements ResultSink<T> {
  constructor(private readonly store: DatasetStore, readonly key: string) {}

  push(value: T): void {
    this.store.set(this.key, value, { broadcast: true });
  }
}
