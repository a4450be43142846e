import type { ResultChannelLike } from '../types/channel.js';
import type { ResultSink } from '../types/sink.js';
import type { ScanValue } from '../types/target.js';
import type { Point } from '../types/scan.js';
import type { ScanObserver } from '../types/runner.js';
import type { ScanWarning } from '../types/error.js';
import type { Instant } from '../types/ids.js';
import { WarningCode } from '../types/enums.js';
import type { ResultFrame } from './ResultCapture.js';

const MAX_WARNINGS = 10;

export interface ChannelBinding<T = unknown> {
  channel: ResultChannelLike<T>;
  sink: ResultSink<T>;
}

export interface ScanSinks {
  /** One sink per scan axis, in axis order. */
  axes: readonly ResultSink<ScanValue>[];
  channels?: readonly ChannelBinding[];
}

/**
 * Delivers completed points to the sinks, axes first, then channels, and keeps the
 * per-run delivery record.
 */
export class RunRecorder {
  private delivered = 0;
  private readonly warnings: ScanWarning[] = [];
  private readonly missing: Record<string, number> = {};

  constructor(
    private readonly sinks: ScanSinks,
    private readonly observer: ScanObserver,
    private readonly now: () => Instant
  ) {}

  get pointsDelivered(): number {
    return this.delivered;
  }

  deliver(point: Point, frame: ResultFrame): void {
    const index = this.delivered;
    point.forEach((value, axis) => this.sinks.axes[axis].push(value));
    for (const channel of frame.duplicates) {
      this.warn(WarningCode.DUPLICATE_RESULT, channel, index, `Result channel '${channel.path}' pushed more than once`);
    }
    for (const { channel, sink } of this.sinks.channels ?? []) {
      if (frame.values.has(channel)) {
        sink.push(frame.values.get(channel));
      } else {
        this.missing[channel.path] = (this.missing[channel.path] ?? 0) + 1;
        this.warn(WarningCode.MISSING_RESULT, channel, index, `No result pushed to '${channel.path}'`);
      }
    }
    this.delivered += 1;
    this.observer.onPointCompleted?.(index, point);
  }

  recordedWarnings(): ScanWarning[] {
    return [...this.warnings];
  }

  missingResults(): Record<string, number> {
    return { ...this.missing };
  }

  private warn(code: WarningCode, channel: ResultChannelLike, pointIndex: number, message: string): void {
    const warning: ScanWarning = { code, message, channel: channel.path, pointIndex, at: this.now() };
    if (this.warnings.length < MAX_WARNINGS) {
      this.warnings.push(warning);
    }
    this.observer.onWarning?.(warning);
  }
}
