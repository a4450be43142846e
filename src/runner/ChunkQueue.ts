import { ScanStateError } from '../errors.js';

/**
 * Bounded FIFO holding the points handed to a remote target that have not been
 * acknowledged yet. Items enter at the tail and leave from the head only.
 */
export class ChunkQueue<T> {
  private readonly items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ScanStateError(`Chunk capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  pushBack(item: T): void {
    if (this.items.length >= this.capacity) {
      throw new ScanStateError('Chunk is full');
    }
    this.items.push(item);
  }

  popFront(): T {
    if (this.items.length === 0) {
      throw new ScanStateError('Acknowledgement received with no point pending');
    }
    const [head] = this.items.splice(0, 1);
    return head;
  }

  peekFront(): T | undefined {
    return this.items[0];
  }

  /** Tops the queue up to capacity; returns the number of items taken from `source`. */
  fillFrom(source: Iterator<T>): number {
    let added = 0;
    while (this.items.length < this.capacity) {
      const next = source.next();
      if (next.done) break;
      this.items.push(next.value);
      added += 1;
    }
    return added;
  }

  toArray(): readonly T[] {
    return [...this.items];
  }

  clear(): void {
    this.items.length = 0;
  }
}
