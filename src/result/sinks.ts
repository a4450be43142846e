import type { ResultSink } from '../types/sink.js';

export class ArraySink<T = unknown> implements ResultSink<T> {
  private readonly values: T[] = [];

  push(value: T): void {
    this.values.push(value);
  }

  getAll(): T[] {
    return [...this.values];
  }

  getLast(): T | undefined {
    return this.values[this.values.length - 1];
  }

  clear(): void {
    this.values.length = 0;
  }
}

/**
 * Keeps only the most recent value.
 */
export class LastValueSink<T = unknown> implements ResultSink<T> {
  private value: T | undefined;
  private pushed = false;

  push(value: T): void {
    this.value = value;
    this.pushed = true;
  }

  get(): T | undefined {
    return this.value;
  }

  hasValue(): boolean {
    return this.pushed;
  }
}

export class CallbackSink<T = unknown> implements ResultSink<T> {
  constructor(private readonly callback: (value: T) => void) {}

  push(value: T): void {
    this.callback(value);
  }
}
