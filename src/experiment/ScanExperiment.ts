import type { Fqn } from '../types/ids.js';
import type { ScanTarget } from '../types/target.js';
import type { ResultChannelLike } from '../types/channel.js';
import type { DefaultAnalysis } from '../types/analysis.js';
import type { ResolvedScanSpec, ScanRun } from '../types/scan.js';
import type { ScanDescription } from '../types/description.js';
import type { ScanFragment, ScanObserver } from '../types/runner.js';
import { RunStatus } from '../types/enums.js';
import { ScanStateError } from '../errors.js';
import type { DatasetStore } from '../store/DatasetStore.js';
import { DatasetAppendSink, DatasetBroadcastSink } from '../store/datasetSinks.js';
import { ScanRunner, type ScanRunnerOptions } from '../runner/ScanRunner.js';
import type { ChannelBinding } from '../runner/RunRecorder.js';
import { applyOverrides, buildScanSpec, parseScanParams } from '../spec/schema.js';
import { resolveScanSpec } from '../spec/scanSpec.js';
import { describeScan } from '../analysis/describeScan.js';
import { shortenToUnambiguousSuffixes } from '../utils/suffixes.js';

export const DATASET_PREFIX = 'scan.';

export interface ExperimentFragment extends ScanFragment {
  parameters(): readonly ScanTarget[];
  resultChannels(): readonly ResultChannelLike[];
  defaultAnalyses?(): readonly DefaultAnalysis[];
}

export interface ScanExperimentOptions extends ScanRunnerOptions {
  rid?: number;
}

interface PreparedScan {
  spec: ResolvedScanSpec;
  channelNames: Map<ResultChannelLike, string>;
  description: ScanDescription;
}

export function shortChannelNames(channels: readonly ResultChannelLike[]): Map<ResultChannelLike, string> {
  const suffixes = shortenToUnambiguousSuffixes(channels.map((channel) => channel.path));
  return new Map(
    channels.map((channel) => [channel, (suffixes.get(channel.path) ?? channel.path).replace(/\//g, '_')])
  );
}

/**
 * Runs a fragment as a top-level scan: parameters come in as plain JSON, coordinates
 * and results go out to a dataset store under `scan.*`.
 */
export class ScanExperiment {
  private readonly runner: ScanRunner;
  private readonly rid: number;
  private prepared: PreparedScan | null = null;
  private pointPhase = false;

  constructor(
    private readonly fragment: ExperimentFragment,
    private readonly store: DatasetStore,
    options: ScanExperimentOptions = {}
  ) {
    const { rid, observer, ...runnerOptions } = options;
    this.rid = rid ?? 0;
    this.runner = new ScanRunner(fragment, { ...runnerOptions, observer: this.wrapObserver(observer) });
  }

  get state(): RunStatus {
    return this.runner.state;
  }

  get description(): ScanDescription | undefined {
    return this.prepared?.description;
  }

  prepare(input: unknown): ScanDescription {
    const params = parseScanParams(input);
    const targets = new Map<Fqn, ScanTarget>(this.fragment.parameters().map((target) => [target.identity, target]));
    const spec = resolveScanSpec(buildScanSpec(params, targets));
    applyOverrides(params, targets);

    const channelNames = shortChannelNames(this.fragment.resultChannels());
    const description = describeScan(spec, this.fragment, channelNames, this.fragment.defaultAnalyses?.() ?? []);
    this.prepared = { spec, channelNames, description };
    return description;
  }

  async run(): Promise<ScanRun> {
    const prepared = this.prepared;
    if (!prepared) {
      throw new ScanStateError('prepare() must be called before run()');
    }
    this.broadcastMetadata(prepared);
    const axisSinks = prepared.spec.axes.map((_, index) => new DatasetAppendSink<number>(this.store, this.key(`points.axis_${index}`)));
    const single = prepared.spec.axes.length === 0;
    const channels: ChannelBinding[] = [...prepared.channelNames].map(([channel, name]) => ({
      channel,
      sink: single
        ? new DatasetBroadcastSink(this.store, this.key(`point.${name}`))
        : new DatasetAppendSink(this.store, this.key(`points.channel_${name}`))
    }));
    return this.settle(await this.runner.run(prepared.spec, { axes: axisSinks, channels }));
  }

  async resume(): Promise<ScanRun> {
    return this.settle(await this.runner.resume());
  }

  cancel(): void {
    this.runner.cancel();
  }

  private settle(run: ScanRun): ScanRun {
    if (run.status === RunStatus.COMPLETED) {
      this.store.set(this.key('completed'), true, { broadcast: true });
    }
    return run;
  }

  private broadcastMetadata(prepared: PreparedScan): void {
    const set = (name: string, value: unknown) => this.store.set(this.key(name), value, { broadcast: true });
    set('fragmentFqn', this.fragment.fqn);
    set('rid', this.rid);
    set('completed', false);
    set('axes', JSON.stringify(prepared.description.axes));
    set('seed', prepared.spec.options.seed);
    set('channels', JSON.stringify(prepared.description.channels));
    set('description', JSON.stringify(prepared.description));
  }

  private wrapObserver(observer: ScanObserver = {}): ScanObserver {
    return {
      ...observer,
      onPointCompleted: (index, point) => {
        if (this.prepared?.spec.axes.length === 0) {
          this.pointPhase = !this.pointPhase;
          this.store.set(this.key('pointPhase'), this.pointPhase, { broadcast: true });
        }
        observer.onPointCompleted?.(index, point);
      }
    };
  }

  private key(name: string): string {
    return `${DATASET_PREFIX}${name}`;
  }
}
