import type { RandomSource } from '../types/random.js';
import type { RangeLimits, ScanGenerator } from '../types/generator.js';
import { GeneratorKind } from '../types/enums.js';
import { ordered } from './sequence.js';
import { requireFinite, requireLevel } from './validate.js';

/**
 * Bisects `[lower, upper]` ever more finely: level 0 gives both ends, level n the
 * midpoints of the 2^(n-1) intervals left by the previous levels.
 */
export class RefiningGenerator implements ScanGenerator {
  readonly kind = GeneratorKind.REFINING;

  constructor(readonly lower: number, readonly upper: number, readonly randomiseOrder = false) {
    requireFinite('lower', lower);
    requireFinite('upper', upper);
  }

  hasLevel(level: number): boolean {
    return requireLevel(level) === 0 || this.lower !== this.upper;
  }

  pointsForLevel(level: number, rng: RandomSource): Iterable<number> {
    if (!this.hasLevel(level)) return [];
    if (level === 0) {
      const ends = this.lower === this.upper ? [this.lower] : [this.lower, this.upper];
      return ordered(ends, this.randomiseOrder, rng);
    }
    return ordered(this.midpoints(level), this.randomiseOrder, rng);
  }

  describeLimits(): RangeLimits {
    return { min: Math.min(this.lower, this.upper), max: Math.max(this.lower, this.upper) };
  }

  private *midpoints(level: number): Generator<number> {
    const divisions = 2 ** level;
    const span = this.upper - this.lower;
    for (let k = 0; k < divisions / 2; k += 1) {
      yield this.lower + (span * (2 * k + 1)) / divisions;
    }
  }
}
