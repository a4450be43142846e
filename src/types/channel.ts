import type { ResultType } from './enums.js';
import type { ResultSink } from './sink.js';

export interface ChannelDescription {
  path: string;
  type: ResultType;
  description: string;
  unit: string;
  scale: number;
}

export interface ResultChannelLike<T = unknown> {
  readonly path: string;
  readonly type: ResultType;
  push(value: T): void;
  getSink(): ResultSink<T> | null;
  setSink(sink: ResultSink<T> | null): void;
  describe(): ChannelDescription;
}
