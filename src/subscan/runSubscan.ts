import type { ScanTarget } from '../types/target.js';
import type { ScanGenerator } from '../types/generator.js';
import type { ResultChannelLike } from '../types/channel.js';
import type { DefaultAnalysis } from '../types/analysis.js';
import type { ScanRun } from '../types/scan.js';
import type { ScanDescription } from '../types/description.js';
import type { ScanFragment } from '../types/runner.js';
import { RunStatus } from '../types/enums.js';
import { ScanInterruptedError, ScanStateError } from '../errors.js';
import { ArraySink } from '../result/sinks.js';
import { ScanRunner, type ScanRunnerOptions } from '../runner/ScanRunner.js';
import { createScanSpec, resolveScanSpec } from '../spec/scanSpec.js';
import { describeScan } from '../analysis/describeScan.js';
import { shortChannelNames } from '../experiment/ScanExperiment.js';

export interface SubscanAxis {
  target: ScanTarget;
  generator: ScanGenerator;
  path?: string;
}

export interface SubscanOptions extends Omit<ScanRunnerOptions, 'scheduler'> {
  numRepeats?: number;
  randomiseOrderGlobally?: boolean;
  seed?: number | null;
  channels?: readonly ResultChannelLike[];
  analyses?: readonly DefaultAnalysis[];
  /** Aborting cancels the subscan at its next point boundary. */
  signal?: AbortSignal;
}

export interface SubscanResult {
  coordinates: Map<ScanTarget, number[]>;
  values: Map<ResultChannelLike, unknown[]>;
  description: ScanDescription;
  run: ScanRun;
}

/**
 * Scans `fragment` to completion from inside another scan's point. A subscan never
 * pauses on its own; cancelling it surfaces as `ScanInterruptedError`.
 */
export async function runSubscan(
  fragment: ScanFragment,
  axes: readonly SubscanAxis[],
  options: SubscanOptions = {}
): Promise<SubscanResult> {
  const { numRepeats, randomiseOrderGlobally, seed, channels = [], analyses = [], signal, ...runnerOptions } = options;
  if (signal?.aborted) {
    throw new ScanInterruptedError('Subscan cancelled');
  }
  const spec = resolveScanSpec(
    createScanSpec({
      axes: axes.map((axis) => ({ target: axis.target, generator: axis.generator, path: axis.path ?? '*' })),
      numRepeats,
      randomiseOrderGlobally,
      seed
    })
  );

  const axisSinks = spec.axes.map(() => new ArraySink<number>());
  const channelSinks = channels.map((channel) => ({ channel, sink: new ArraySink<unknown>() }));
  const runner = new ScanRunner(fragment, runnerOptions);
  const onAbort = () => runner.cancel();
  signal?.addEventListener('abort', onAbort, { once: true });
  let run: ScanRun;
  try {
    run = await runner.run(spec, { axes: axisSinks, channels: channelSinks });
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
  if (run.status === RunStatus.CANCELLED) {
    throw new ScanInterruptedError('Subscan cancelled');
  }
  if (run.status !== RunStatus.COMPLETED) {
    throw new ScanStateError(`Subscan ended in state ${run.status}`);
  }

  return {
    coordinates: new Map(spec.axes.map((axis, index) => [axis.target, axisSinks[index].getAll()])),
    values: new Map(channelSinks.map(({ channel, sink }) => [channel, sink.getAll()])),
    description: describeScan(spec, fragment, shortChannelNames(channels), analyses),
    run
  };
}
