import type { ExecutionMode, RunStatus } from './enums.js';
import type { Fqn, Instant, RunId } from './ids.js';
import type { ScanGenerator } from './generator.js';
import type { ScanTarget, ScanValue } from './target.js';
import type { ScanWarning } from './error.js';

export type Point = readonly ScanValue[];

export interface ScanAxis {
  readonly target: ScanTarget;
  readonly path: string;
  readonly generator: ScanGenerator;
}

export interface ScanOptions {
  readonly numRepeats: number;
  readonly randomiseOrderGlobally: boolean;
  readonly seed: number | null;
}

export interface ResolvedScanOptions extends ScanOptions {
  readonly seed: number;
}

export interface ScanSpec {
  readonly axes: readonly ScanAxis[];
  readonly options: ScanOptions;
  readonly continuousWithoutAxes: boolean;
}

export interface ResolvedScanSpec extends ScanSpec {
  readonly options: ResolvedScanOptions;
}

export interface ScanRun {
  runId: RunId;
  fragmentFqn: Fqn;
  seed: number;
  mode: ExecutionMode;
  status: RunStatus;
  startedAt: Instant;
  finishedAt?: Instant;
  pointsDelivered: number;
  warnings: ScanWarning[];
  missingResults: Record<string, number>;
}
