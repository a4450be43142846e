import { describe, expect, it, vi } from 'vitest';
import { FloatChannel, IntChannel, ResultChannel } from './ResultChannel.js';
import { ArraySink, CallbackSink, LastValueSink } from './sinks.js';
import { ResultTypeError, ScanStateError } from '../errors.js';
import { ResultType } from '../types/enums.js';

describe('ResultChannel', () => {
  it('forwards pushes to its sink', () => {
    const channel = new FloatChannel('readout/p', { unit: 'counts' });
    const sink = new ArraySink<number>();
    channel.setSink(sink);
    channel.push(0.25);
    expect(sink.getAll()).toEqual([0.25]);
    expect(channel.describe()).toEqual({ path: 'readout/p', type: 'float', description: '', unit: 'counts', scale: 1 });
  });

  it('needs a sink', () => {
    expect(() => new IntChannel('n').push(1)).toThrow(ScanStateError);
  });

  it('checks value types', () => {
    const flag = new ResultChannel<unknown>('flag', ResultType.BOOL);
    flag.setSink(new ArraySink());
    expect(() => flag.push(1)).toThrow(ResultTypeError);
    const loose = new ResultChannel<unknown>('f', ResultType.FLOAT);
    loose.setSink(new ArraySink());
    expect(() => loose.push('x')).toThrow('Expected a number, got string');
    const opaque = new ResultChannel<unknown>('blob', ResultType.OPAQUE);
    const sink = new LastValueSink<unknown>();
    opaque.setSink(sink);
    opaque.push({ any: 'thing' });
    expect(sink.get()).toEqual({ any: 'thing' });
  });
});

describe('sinks', () => {
  it('ArraySink keeps every value', () => {
    const sink = new ArraySink<number>();
    expect(sink.getLast()).toBeUndefined();
    sink.push(1);
    sink.push(2);
    expect(sink.getLast()).toBe(2);
    sink.clear();
    expect(sink.getAll()).toEqual([]);
  });

  it('LastValueSink tracks whether anything arrived', () => {
    const sink = new LastValueSink<number>();
    expect(sink.hasValue()).toBe(false);
    sink.push(3);
    sink.push(4);
    expect(sink.hasValue()).toBe(true);
    expect(sink.get()).toBe(4);
  });

  it('CallbackSink calls back', () => {
    const callback = vi.fn();
    new CallbackSink<string>(callback).push('x');
    expect(callback).toHaveBeenCalledWith('x');
  });
});
