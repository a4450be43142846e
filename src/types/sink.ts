export interface ResultSink<T = unknown> {
  push(value: T): void;
}
