import { describe, expect, it } from 'vitest';
import { createGenerator, generatorTypes } from './registry.js';
import { LinearGenerator } from './LinearGenerator.js';
import { ExpandingGenerator } from './ExpandingGenerator.js';
import { Mulberry32 } from '../random/Mulberry32.js';
import { ConfigError } from '../errors.js';
import { ErrorCode, GeneratorKind } from '../types/enums.js';

describe('createGenerator', () => {
  it('builds generators from plain ranges', () => {
    const gen = createGenerator('linear', { start: 0, stop: 1, numPoints: 3 });
    expect(gen).toBeInstanceOf(LinearGenerator);
    expect([...gen.pointsForLevel(0, new Mulberry32(1))]).toEqual([0, 0.5, 1]);
  });

  it('maps expanding limits', () => {
    const gen = createGenerator('expanding', { centre: 0, spacing: 2, limitUpper: 3 });
    expect(gen).toBeInstanceOf(ExpandingGenerator);
    expect([...gen.pointsForLevel(2, new Mulberry32(1))]).toEqual([-4]);
  });

  it('builds every registered kind', () => {
    const ranges: Record<GeneratorKind, unknown> = {
      [GeneratorKind.LINEAR]: { start: 0, stop: 1, numPoints: 2 },
      [GeneratorKind.LINEAR_STEP]: { start: 0, stop: 1, step: 0.5 },
      [GeneratorKind.REFINING]: { lower: 0, upper: 1 },
      [GeneratorKind.LIST]: { values: [1] },
      [GeneratorKind.CENTRE_SPAN]: { centre: 0, halfSpan: 1, numPoints: 3 },
      [GeneratorKind.EXPANDING]: { centre: 0, spacing: 1 }
    };
    for (const kind of generatorTypes()) {
      expect(createGenerator(kind, ranges[kind]).kind).toBe(kind);
    }
  });

  it('rejects unknown types', () => {
    try {
      createGenerator('spiral', {});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toMatchObject({ code: ErrorCode.UNKNOWN_GENERATOR, message: "Axis type 'spiral' not implemented" });
    }
  });

  it('rejects malformed ranges', () => {
    expect(() => createGenerator('linear', { start: 0, stop: 1 })).toThrow(
      "Invalid range for 'linear' axis: numPoints: Required"
    );
    expect(() => createGenerator('list', { values: ['a'] })).toThrow(/Invalid range for 'list' axis: values\.0/);
  });
});
