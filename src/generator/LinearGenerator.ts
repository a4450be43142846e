import type { RandomSource } from '../types/random.js';
import type { RangeLimits, ScanGenerator } from '../types/generator.js';
import { GeneratorKind } from '../types/enums.js';
import { linspace, ordered } from './sequence.js';
import { requireCount, requireFinite, requireLevel } from './validate.js';

/**
 * `numPoints` evenly spaced values from `start` to `stop`, both included.
 */
export class LinearGenerator implements ScanGenerator {
  readonly kind = GeneratorKind.LINEAR;

  constructor(
    readonly start: number,
    readonly stop: number,
    readonly numPoints: number,
    readonly randomiseOrder = false
  ) {
    requireFinite('start', start);
    requireFinite('stop', stop);
    requireCount('numPoints', numPoints);
  }

  hasLevel(level: number): boolean {
    return requireLevel(level) === 0;
  }

  pointsForLevel(level: number, rng: RandomSource): Iterable<number> {
    if (!this.hasLevel(level)) return [];
    return ordered(linspace(this.start, this.stop, this.numPoints), this.randomiseOrder, rng);
  }

  describeLimits(): RangeLimits {
    if (this.numPoints === 1) {
      return { min: this.start, max: this.start, increment: 0 };
    }
    return {
      min: Math.min(this.start, this.stop),
      max: Math.max(this.start, this.stop),
      increment: Math.abs(this.stop - this.start) / (this.numPoints - 1)
    };
  }
}
