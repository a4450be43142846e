import type { RandomSource } from '../types/random.js';
import type { RangeLimits, ScanGenerator } from '../types/generator.js';
import { GeneratorKind } from '../types/enums.js';
import { ordered } from './sequence.js';
import { requireFinite, requireLevel, requirePositive } from './validate.js';

const STEP_TOLERANCE = 1e-9;

/**
 * Walks from `start` towards `stop` in increments of the (positive) `step`. `stop` is
 * included when it lies on the grid.
 */
export class LinearStepGenerator implements ScanGenerator {
  readonly kind = GeneratorKind.LINEAR_STEP;
  private readonly count: number;
  private readonly direction: number;

  constructor(
    readonly start: number,
    readonly stop: number,
    readonly step: number,
    readonly randomiseOrder = false
  ) {
    requireFinite('start', start);
    requireFinite('stop', stop);
    requirePositive('step', step);
    this.count = Math.floor(Math.abs(stop - start) / step + STEP_TOLERANCE) + 1;
    this.direction = stop >= start ? 1 : -1;
  }

  hasLevel(level: number): boolean {
    return requireLevel(level) === 0;
  }

  pointsForLevel(level: number, rng: RandomSource): Iterable<number> {
    if (!this.hasLevel(level)) return [];
    return ordered(this.values(), this.randomiseOrder, rng);
  }

  describeLimits(): RangeLimits {
    const last = this.valueAt(this.count - 1);
    return { min: Math.min(this.start, last), max: Math.max(this.start, last), increment: this.step };
  }

  private *values(): Generator<number> {
    for (let i = 0; i < this.count; i += 1) {
      yield this.valueAt(i);
    }
  }

  private valueAt(index: number): number {
    const value = this.start + this.direction * this.step * index;
    if (Math.abs(value - this.stop) <= STEP_TOLERANCE * Math.max(1, Math.abs(this.stop))) {
      return this.stop;
    }
    return value;
  }
}
