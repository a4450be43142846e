import type { ExperimentFragment } from '../../src/experiment/ScanExperiment.js';
import type { ScanTarget } from '../../src/types/target.js';
import type { ResultChannelLike } from '../../src/types/channel.js';
import type { DefaultAnalysis } from '../../src/types/analysis.js';
import type { PauseSignal } from '../../src/types/runner.js';
import { FloatParamStore, IntParamStore } from '../../src/param/ParamStore.js';
import { FloatChannel, IntChannel } from '../../src/result/ResultChannel.js';
import { OnlineFit } from '../../src/analysis/OnlineFit.js';

/**
 * p = freq + 1, aux/p = 2 * freq, counts = count.
 */
export class ResonanceFragment implements ExperimentFragment {
  readonly fqn = 'exp.Resonance';
  readonly freq = new FloatParamStore('exp.freq', 0.5, { unit: 'MHz' });
  readonly count = new IntParamStore('exp.count', 1);
  readonly p = new FloatChannel('readout/p');
  readonly auxP = new FloatChannel('aux/p');
  readonly counts = new IntChannel('counts');

  parameters(): ScanTarget[] {
    return [this.freq, this.count];
  }

  resultChannels(): ResultChannelLike[] {
    return [this.p, this.auxP, this.counts];
  }

  defaultAnalyses(): DefaultAnalysis[] {
    return [new OnlineFit('lorentzian', { fqn: 'exp.freq', path: '*' }, this.p)];
  }

  runOnce(): void {
    this.p.push(this.freq.get() + 1);
    this.auxP.push(this.freq.get() * 2);
    this.counts.push(this.count.get());
  }
}

export function pauseOnCall(n: number): PauseSignal {
  let calls = 0;
  return {
    shouldPause: () => {
      calls += 1;
      return calls === n;
    }
  };
}
