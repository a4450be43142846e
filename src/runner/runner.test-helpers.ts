import type { PauseSignal, RemoteTarget, ScanFragment } from '../types/runner.js';
import type { ScanValue } from '../types/target.js';
import type { Instant } from '../types/ids.js';
import { FloatParamStore } from '../param/ParamStore.js';
import { FloatChannel } from '../result/ResultChannel.js';

export function makeClock(start = 1_700_000_000_000): () => Instant {
  let current = start;
  return () => new Date(current++).toISOString();
}

/** Pushes `x + 1` to `result` for every point. */
export class AddOneFragment implements ScanFragment {
  readonly fqn = 'test.AddOne';
  readonly x = new FloatParamStore('test.x');
  readonly result = new FloatChannel('result');
  runs = 0;
  hostSetup?: () => void;
  onRun: (x: number) => void = () => undefined;

  runOnce(): void {
    this.runs += 1;
    this.onRun(this.x.get());
    this.result.push(this.x.get() + 1);
  }
}

/** Answers true to the `n`-th question only (1-based). */
export function pauseOnCall(n: number): PauseSignal & { calls: number } {
  const signal = {
    calls: 0,
    shouldPause: () => {
      signal.calls += 1;
      return signal.calls === n;
    }
  };
  return signal;
}

/**
 * In-process remote target with a device clock that advances by `stepSeconds` per
 * executed point.
 */
export class FakeRemote implements RemoteTarget {
  clock = 0;
  closed = 0;
  readonly executed: ScanValue[][] = [];

  constructor(
    private readonly onPoint: (values: readonly ScanValue[], index: number) => void | Promise<void>,
    private readonly stepSeconds = 0.125
  ) {}

  now(): number {
    return this.clock;
  }

  async runPoint(values: readonly ScanValue[]): Promise<void> {
    const index = this.executed.length;
    this.executed.push([...values]);
    await this.onPoint(values, index);
    this.clock += this.stepSeconds;
  }

  close(): void {
    this.closed += 1;
  }
}
