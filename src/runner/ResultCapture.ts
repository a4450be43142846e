import type { ResultChannelLike } from '../types/channel.js';
import type { ResultSink } from '../types/sink.js';
import { ScanStateError } from '../errors.js';

export interface ResultFrame {
  values: Map<ResultChannelLike, unknown>;
  duplicates: ResultChannelLike[];
}

/**
 * Redirects the declared result channels into per-point frames while a scan runs, so
 * that results travel with the point they belong to.
 */
export class ResultCapture {
  private frame: ResultFrame | null = null;
  private readonly saved = new Map<ResultChannelLike, ResultSink | null>();

  constructor(private readonly channels: readonly ResultChannelLike[]) {}

  attach(): void {
    for (const channel of this.channels) {
      this.saved.set(channel, channel.getSink());
      channel.setSink({ push: (value: unknown) => this.capture(channel, value) });
    }
  }

  detach(): void {
    for (const [channel, sink] of this.saved) {
      channel.setSink(sink);
    }
    this.saved.clear();
    this.frame = null;
  }

  open(): void {
    this.frame = { values: new Map(), duplicates: [] };
  }

  close(): ResultFrame {
    const frame = this.frame;
    if (!frame) {
      throw new ScanStateError('No result frame is open');
    }
    this.frame = null;
    return frame;
  }

  discard(): void {
    this.frame = null;
  }

  private capture(channel: ResultChannelLike, value: unknown): void {
    if (!this.frame) {
      throw new ScanStateError(`Result pushed to '${channel.path}' outside of a scan point`);
    }
    if (this.frame.values.has(channel)) {
      this.frame.duplicates.push(channel);
    }
    this.frame.values.set(channel, value);
  }
}
