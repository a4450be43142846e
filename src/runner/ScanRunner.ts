import { setImmediate as nextTurn } from 'node:timers/promises';
import type { Instant, RunId } from '../types/ids.js';
import type { Point, ResolvedScanSpec, ScanAxis, ScanRun, ScanSpec } from '../types/scan.js';
import type { PauseSignal, RemoteTarget, ScanControl, ScanFragment, ScanObserver } from '../types/runner.js';
import { ErrorCode, ExecutionMode, RunStatus } from '../types/enums.js';
import {
  ConfigError,
  ScanExhausted,
  ScanInterruptedError,
  ScanStateError,
  UnsupportedDimensionalityError,
  isInterruption
} from '../errors.js';
import { resolveScanSpec } from '../spec/scanSpec.js';
import { continuousPoints, generatePoints } from '../points/generatePoints.js';
import { nowInstant } from '../utils/time.js';
import { createId } from '../utils/id.js';
import { AckChannel } from './AckChannel.js';
import { ChunkQueue } from './ChunkQueue.js';
import { ResultCapture, type ResultFrame } from './ResultCapture.js';
import { RunRecorder, type ScanSinks } from './RunRecorder.js';
import { runRemoteSession, type CoordinatorPort } from './remoteSession.js';

export const DEFAULT_CHUNK_SIZE = 10;
export const DEFAULT_PAUSE_CHECK_INTERVAL_S = 0.2;
export const DEFAULT_MAX_REMOTE_AXES = 3;

const NEVER_PAUSE: PauseSignal = { shouldPause: () => false };

export interface ScanRunnerOptions {
  scheduler?: PauseSignal;
  observer?: ScanObserver;
  /** Runs points on a remote target in chunks instead of calling `runOnce` inline. */
  remote?: RemoteTarget;
  chunkSize?: number;
  pauseCheckIntervalSeconds?: number;
  maxRemoteAxes?: number;
  now?: () => Instant;
  createRunId?: () => RunId;
}

interface ActiveRun {
  record: ScanRun;
  spec: ResolvedScanSpec;
  points: Iterator<Point>;
  chunk: ChunkQueue<Point>;
  recorder: RunRecorder;
  capture: ResultCapture;
}

function* coercePoints(points: Iterable<Point>, axes: readonly ScanAxis[]): Generator<Point> {
  for (const point of points) {
    yield axes.map((axis, index) => axis.target.coerce(point[index]));
  }
}

/**
 * Drives one scan at a time over a fragment: IDLE -> RUNNING -> PAUSED | COMPLETED |
 * CANCELLED | FAILED, with PAUSED -> RUNNING through `resume()`. Pausing hands control
 * back to the caller; nothing blocks inside the runner.
 */
export class ScanRunner {
  readonly control: ScanControl;
  private readonly scheduler: PauseSignal;
  private readonly observer: ScanObserver;
  private readonly remote?: RemoteTarget;
  private readonly chunkSize: number;
  private readonly pauseCheckIntervalSeconds: number;
  private readonly maxRemoteAxes: number;
  private readonly nowFn: () => Instant;
  private readonly runIdFn: () => RunId;
  private status = RunStatus.IDLE;
  private active: ActiveRun | null = null;
  private cancelRequested = false;

  constructor(private readonly fragment: ScanFragment, options: ScanRunnerOptions = {}) {
    this.scheduler = options.scheduler ?? NEVER_PAUSE;
    this.observer = options.observer ?? {};
    this.remote = options.remote;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.pauseCheckIntervalSeconds = options.pauseCheckIntervalSeconds ?? DEFAULT_PAUSE_CHECK_INTERVAL_S;
    this.maxRemoteAxes = options.maxRemoteAxes ?? DEFAULT_MAX_REMOTE_AXES;
    this.nowFn = options.now ?? nowInstant;
    this.runIdFn = options.createRunId ?? (() => createId('run:'));
    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new ConfigError(`chunkSize must be a positive integer, got ${this.chunkSize}`);
    }
    if (!Number.isFinite(this.pauseCheckIntervalSeconds) || this.pauseCheckIntervalSeconds < 0) {
      throw new ConfigError(`pauseCheckIntervalSeconds must be a non-negative number, got ${this.pauseCheckIntervalSeconds}`);
    }
    if (!Number.isInteger(this.maxRemoteAxes) || this.maxRemoteAxes < 0) {
      throw new ConfigError(`maxRemoteAxes must be a non-negative integer, got ${this.maxRemoteAxes}`);
    }
    this.control = { cancel: () => this.cancel() };
  }

  get state(): RunStatus {
    return this.status;
  }

  get mode(): ExecutionMode {
    return this.remote ? ExecutionMode.REMOTE : ExecutionMode.HOST;
  }

  async run(spec: ScanSpec, sinks: ScanSinks): Promise<ScanRun> {
    if (this.status === RunStatus.RUNNING || this.status === RunStatus.PAUSED) {
      throw new ScanStateError(`Cannot start a scan while another one is ${this.status.toLowerCase()}`);
    }
    this.validate(spec, sinks);
    const resolved = resolveScanSpec(spec);

    const source =
      resolved.axes.length === 0 && resolved.continuousWithoutAxes
        ? continuousPoints()
        : generatePoints(
            resolved.axes.map((axis) => axis.generator),
            resolved.options
          );
    const record: ScanRun = {
      runId: this.runIdFn(),
      fragmentFqn: this.fragment.fqn,
      seed: resolved.options.seed,
      mode: this.mode,
      status: RunStatus.RUNNING,
      startedAt: this.nowFn(),
      pointsDelivered: 0,
      warnings: [],
      missingResults: {}
    };
    const active: ActiveRun = {
      record,
      spec: resolved,
      points: coercePoints(source, resolved.axes),
      chunk: new ChunkQueue<Point>(this.chunkSize),
      recorder: new RunRecorder(sinks, this.observer, this.nowFn),
      capture: new ResultCapture((sinks.channels ?? []).map((binding) => binding.channel))
    };
    this.active = active;
    this.cancelRequested = false;
    this.status = RunStatus.RUNNING;
    this.observer.onRunStarted?.(this.snapshot(active));
    return this.drive(active);
  }

  async resume(): Promise<ScanRun> {
    const active = this.active;
    if (this.status !== RunStatus.PAUSED || !active) {
      throw new ScanStateError(`Only a paused scan can be resumed (state is ${this.status})`);
    }
    this.status = RunStatus.RUNNING;
    active.record.status = RunStatus.RUNNING;
    return this.drive(active);
  }

  /**
   * Takes effect at the next point boundary of a running scan, or at once when the scan
   * is paused.
   */
  cancel(): void {
    if (this.status === RunStatus.RUNNING) {
      this.cancelRequested = true;
    } else if (this.status === RunStatus.PAUSED && this.active) {
      this.finish(this.active, RunStatus.CANCELLED);
    }
  }

  private validate(spec: ScanSpec, sinks: ScanSinks): void {
    const axisCount = spec.axes.length;
    if (sinks.axes.length !== axisCount) {
      throw new ConfigError(
        `Expected ${axisCount} axis sinks, got ${sinks.axes.length}`,
        ErrorCode.INVALID_SINKS
      );
    }
    const channels = new Set<unknown>();
    for (const binding of sinks.channels ?? []) {
      if (channels.has(binding.channel)) {
        throw new ConfigError(`Result channel '${binding.channel.path}' is bound twice`, ErrorCode.INVALID_SINKS);
      }
      channels.add(binding.channel);
    }
    if (!Number.isInteger(spec.options.numRepeats) || spec.options.numRepeats < 1) {
      throw new ConfigError(`numRepeats must be a positive integer, got ${spec.options.numRepeats}`);
    }
    if (this.remote && axisCount > this.maxRemoteAxes) {
      throw new UnsupportedDimensionalityError(axisCount, this.maxRemoteAxes);
    }
  }

  private async drive(active: ActiveRun): Promise<ScanRun> {
    let outcome: RunStatus;
    active.capture.attach();
    try {
      outcome = this.remote ? await this.driveRemote(active, this.remote) : await this.driveHost(active);
    } catch (err) {
      if (!isInterruption(err)) {
        this.finish(active, RunStatus.FAILED);
        throw err;
      }
      outcome = RunStatus.CANCELLED;
    } finally {
      active.capture.detach();
    }

    if (outcome === RunStatus.PAUSED) {
      this.status = RunStatus.PAUSED;
      active.record.status = RunStatus.PAUSED;
      const run = this.snapshot(active);
      this.observer.onRunPaused?.(run);
      return run;
    }
    return this.finish(active, outcome);
  }

  private async driveHost(active: ActiveRun): Promise<RunStatus> {
    const { spec, capture } = active;
    while (true) {
      if (this.cancelRequested) return RunStatus.CANCELLED;
      const next = active.points.next();
      if (next.done) return RunStatus.COMPLETED;
      const point = next.value;
      spec.axes.forEach((axis, index) => axis.target.setValue(point[index]));

      capture.open();
      try {
        await this.fragment.hostSetup?.();
        await this.fragment.runOnce();
      } catch (err) {
        capture.discard();
        throw err;
      }
      active.recorder.deliver(point, capture.close());

      if (await this.shouldSuspend()) {
        return this.cancelRequested ? RunStatus.CANCELLED : RunStatus.PAUSED;
      }
    }
  }

  private async driveRemote(active: ActiveRun, remote: RemoteTarget): Promise<RunStatus> {
    const acks = new AckChannel<ResultFrame>((frame) => this.acknowledgePoint(active, frame));
    const port: CoordinatorPort = {
      requestChunk: async () => {
        await acks.drain();
        await nextTurn();
        if (this.cancelRequested) throw new ScanInterruptedError('Scan cancelled');
        active.chunk.fillFrom(active.points);
        if (active.chunk.isEmpty) throw new ScanExhausted();
        return active.chunk.toArray();
      },
      pointCompleted: (frame) => acks.post(frame),
      checkPause: async () => {
        await acks.drain();
        return this.shouldSuspend();
      }
    };

    try {
      this.updateHostShadow(active);
      await this.fragment.hostSetup?.();
      await runRemoteSession(remote, port, active.capture, {
        pauseCheckIntervalSeconds: this.pauseCheckIntervalSeconds
      });
      await acks.drain();
      return this.cancelRequested ? RunStatus.CANCELLED : RunStatus.PAUSED;
    } catch (err) {
      await acks.drain();
      if (err instanceof ScanExhausted) return RunStatus.COMPLETED;
      throw err;
    } finally {
      await remote.close?.();
    }
  }

  private acknowledgePoint(active: ActiveRun, frame: ResultFrame): void {
    const point = active.chunk.popFront();
    active.recorder.deliver(point, frame);
    this.updateHostShadow(active);
  }

  /**
   * Keeps the host-side targets at the values of the next point to execute remotely,
   * pulling a fresh chunk when the current one has run dry.
   */
  private updateHostShadow(active: ActiveRun): void {
    if (active.chunk.isEmpty) {
      active.chunk.fillFrom(active.points);
    }
    const next = active.chunk.peekFront();
    if (!next) return;
    active.spec.axes.forEach((axis, index) => axis.target.setValue(next[index]));
  }

  /**
   * Every suspension boundary gives the event loop one turn, so that a `cancel()`
   * scheduled from a timer or I/O callback is seen even when the fragment never awaits.
   */
  private async shouldSuspend(): Promise<boolean> {
    await nextTurn();
    if (this.cancelRequested) return true;
    return this.scheduler.shouldPause();
  }

  private finish(active: ActiveRun, status: RunStatus): ScanRun {
    this.status = status;
    active.record.status = status;
    active.record.finishedAt = this.nowFn();
    active.chunk.clear();
    this.active = null;
    this.cancelRequested = false;
    const run = this.snapshot(active);
    this.observer.onRunFinished?.(run);
    return run;
  }

  private snapshot(active: ActiveRun): ScanRun {
    return {
      ...active.record,
      pointsDelivered: active.recorder.pointsDelivered,
      warnings: active.recorder.recordedWarnings(),
      missingResults: active.recorder.missingResults()
    };
  }
}
