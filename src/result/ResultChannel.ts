import type { ChannelDescription, ResultChannelLike } from '../types/channel.js';
import type { ResultSink } from '../types/sink.js';
import { ResultType } from '../types/enums.js';
import { ResultTypeError, ScanStateError } from '../errors.js';

export interface ResultChannelOptions {
  description?: string;
  unit?: string;
  scale?: number;
}

function checkValue(type: ResultType, value: unknown): void {
  switch (type) {
    case ResultType.FLOAT:
      if (typeof value !== 'number') throw new ResultTypeError(`Expected a number, got ${typeof value}`);
      return;
    case ResultType.INT:
      if (!Number.isInteger(value)) throw new ResultTypeError(`Expected an integer, got ${String(value)}`);
      return;
    case ResultType.BOOL:
      if (typeof value !== 'boolean') throw new ResultTypeError(`Expected a boolean, got ${typeof value}`);
      return;
    case ResultType.OPAQUE:
      return;
  }
}

export class ResultChannel<T = unknown> implements ResultChannelLike<T> {
  readonly description: string;
  readonly unit: string;
  readonly scale: number;
  private sink: ResultSink<T> | null = null;

  constructor(readonly path: string, readonly type: ResultType, options: ResultChannelOptions = {}) {
    this.description = options.description ?? '';
    this.unit = options.unit ?? '';
    this.scale = options.scale ?? 1;
  }

  push(value: T): void {
    checkValue(this.type, value);
    if (!this.sink) {
      throw new ScanStateError(`No sink attached to result channel '${this.path}'`);
    }
    this.sink.push(value);
  }

  getSink(): ResultSink<T> | null {
    return this.sink;
  }

  setSink(sink: ResultSink<T> | null): void {
    this.sink = sink;
  }

  describe(): ChannelDescription {
    return {
      path: this.path,
      type: this.type,
      description: this.description,
      unit: this.unit,
      scale: this.scale
    };
  }
}

export class FloatChannel extends ResultChannel<number> {
  constructor(path: string, options: ResultChannelOptions = {}) {
    super(path, ResultType.FLOAT, options);
  }
}

export class IntChannel extends ResultChannel<number> {
  constructor(path: string, options: ResultChannelOptions = {}) {
    super(path, ResultType.INT, options);
  }
}
