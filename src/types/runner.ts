import type { Fqn } from './ids.js';
import type { Point, ScanRun } from './scan.js';
import type { ScanValue } from './target.js';
import type { ScanWarning } from './error.js';

export interface PauseSignal {
  shouldPause(): boolean | Promise<boolean>;
}

export interface ScanFragment {
  readonly fqn: Fqn;
  hostSetup?(): void | Promise<void>;
  runOnce(): void | Promise<void>;
}

export interface RemoteTarget {
  /** Device clock, in seconds. */
  now(): number;
  runPoint(values: readonly ScanValue[]): Promise<void>;
  close?(): void | Promise<void>;
}

export interface ScanObserver {
  onRunStarted?(run: ScanRun): void;
  onPointCompleted?(index: number, point: Point): void;
  onWarning?(warning: ScanWarning): void;
  onRunPaused?(run: ScanRun): void;
  onRunFinished?(run: ScanRun): void;
}

export interface ScanControl {
  cancel(): void;
}
