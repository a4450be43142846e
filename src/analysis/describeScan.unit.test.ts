import { describe, expect, it } from 'vitest';
import { describeScan } from './describeScan.js';
import { OnlineFit, onlineResult, fixedValue } from './OnlineFit.js';
import { filterDefaultAnalyses } from './filterDefaultAnalyses.js';
import { ScanAnnotationContext } from './AnnotationContext.js';
import { createScanSpec, resolveScanSpec } from '../spec/scanSpec.js';
import { FloatParamStore } from '../param/ParamStore.js';
import { LinearGenerator } from '../generator/LinearGenerator.js';
import { ListGenerator } from '../generator/ListGenerator.js';
import { FloatChannel } from '../result/ResultChannel.js';
import type { ResultChannelLike } from '../types/channel.js';
import { ConfigError } from '../errors.js';
import { ErrorCode } from '../types/enums.js';

const freq = new FloatParamStore('exp.freq', 0, { unit: 'MHz' });
const delay = new FloatParamStore('exp.delay');
const p = new FloatChannel('readout/p');
const names = new Map<ResultChannelLike, string>([[p, 'p']]);
const freqAxis = { fqn: 'exp.freq', path: '*' };

function freqScan() {
  return resolveScanSpec(
    createScanSpec({
      axes: [{ target: freq, path: '*', generator: new LinearGenerator(1, 3, 3) }],
      numRepeats: 2,
      seed: 5
    })
  );
}

describe('describeScan', () => {
  it('describes axes, channels and applicable fits', () => {
    const description = describeScan(freqScan(), { fqn: 'exp.Ramsey' }, names, [new OnlineFit('lorentzian', freqAxis, p)]);
    const name = 'fit_lorentzian_channel_p';

    expect(description.fragmentFqn).toBe('exp.Ramsey');
    expect(description.seed).toBe(5);
    expect(description.numRepeats).toBe(2);
    expect(description.axes).toEqual([
      {
        param: {
          fqn: 'exp.freq',
          type: 'float',
          description: '',
          default: '0',
          spec: { scale: 1, step: 0.1, isScannable: true, unit: 'MHz' }
        },
        path: '*',
        min: 1,
        max: 3,
        increment: 1
      }
    ]);
    expect(description.channels).toEqual({
      p: { path: 'readout/p', type: 'float', description: '', unit: '', scale: 1 }
    });
    expect(description.annotations).toEqual([
      {
        kind: 'computed_curve',
        parameters: { functionName: 'lorentzian', associatedChannels: ['channel_p'] },
        coordinates: {},
        data: {
          a: onlineResult(name, 'a'),
          fwhm: onlineResult(name, 'fwhm'),
          x0: onlineResult(name, 'x0'),
          y0: onlineResult(name, 'y0')
        }
      },
      {
        kind: 'location',
        parameters: { associatedChannels: ['channel_p'] },
        coordinates: { axis_0: { kind: 'online_result', analysisName: name, resultKey: 'x0' } },
        data: { axis_0_error: { kind: 'online_result', analysisName: name, resultKey: 'x0_error' } }
      }
    ]);
    expect(description.onlineAnalyses).toEqual({
      [name]: { kind: 'named_fit', fitType: 'lorentzian', data: { x: 'axis_0', y: 'channel_p' }, constants: {}, initialValues: {} }
    });
  });

  it('skips fits over axes that are not scanned', () => {
    const description = describeScan(freqScan(), { fqn: 'exp.Ramsey' }, names, [
      new OnlineFit('line', { fqn: 'exp.delay', path: '*' }, p)
    ]);
    expect(description.annotations).toEqual([]);
    expect(description.onlineAnalyses).toEqual({});
  });

  it('adds no location for fits without a centre', () => {
    const fit = new OnlineFit('exponential_decay', freqAxis, p, { constants: { y_inf: 0 }, initialValues: { tau: 2 } });
    const description = describeScan(freqScan(), { fqn: 'exp.Ramsey' }, names, [fit]);
    expect(description.annotations.map((a) => a.kind)).toEqual(['computed_curve']);
    expect(description.onlineAnalyses.fit_exponential_decay_channel_p).toMatchObject({
      constants: { y_inf: 0 },
      initialValues: { tau: 2 }
    });
  });

  it('rejects two analyses with the same name', () => {
    const fits = [new OnlineFit('gaussian', freqAxis, p), new OnlineFit('gaussian', freqAxis, p)];
    expect(() => describeScan(freqScan(), { fqn: 'exp.Ramsey' }, names, fits)).toThrow(
      "An online analysis with name 'fit_gaussian_channel_p' already exists"
    );
    try {
      describeScan(freqScan(), { fqn: 'exp.Ramsey' }, names, fits);
      expect.unreachable();
    } catch (err) {
      expect(err).toMatchObject({ code: ErrorCode.DUPLICATE_ANALYSIS });
    }
  });

  it('describes list axes by their values', () => {
    const spec = resolveScanSpec(
      createScanSpec({ axes: [{ target: delay, path: 'a', generator: new ListGenerator([3, 1]) }], seed: 1 })
    );
    const description = describeScan(spec, { fqn: 'exp.X' }, new Map<ResultChannelLike, string>());
    expect(description.axes[0]).toMatchObject({ path: 'a', values: [3, 1] });
    expect(description.channels).toEqual({});
  });
});

describe('filterDefaultAnalyses', () => {
  it('keeps analyses whose axes are all scanned', () => {
    const onFreq = new OnlineFit('line', freqAxis, p);
    const onDelay = new OnlineFit('line', { fqn: 'exp.delay', path: '*' }, p);
    const onOtherPath = new OnlineFit('line', { fqn: 'exp.freq', path: 'b' }, p);
    expect(filterDefaultAnalyses([onFreq, onDelay, onOtherPath], [freqAxis])).toEqual([onFreq]);
  });
});

describe('ScanAnnotationContext', () => {
  it('names axes by position and channels by short name', () => {
    const context = new ScanAnnotationContext([{ fqn: 'a', path: '*' }, freqAxis], names);
    expect(context.axisName(freqAxis)).toBe('axis_1');
    expect(context.channelName(p)).toBe('channel_p');
    expect(() => context.axisName({ fqn: 'zzz', path: '*' })).toThrow(ConfigError);
    expect(() => context.channelName(new FloatChannel('other'))).toThrow("Result channel 'other' has no short name");
  });
});

describe('OnlineFit', () => {
  it('knows its fit types', () => {
    expect(() => new OnlineFit('sinc', freqAxis, p)).toThrow("Unknown fit type 'sinc'");
  });

  it('builds fixed values', () => {
    expect(fixedValue(1.5)).toEqual({ kind: 'fixed', value: 1.5 });
  });
});
