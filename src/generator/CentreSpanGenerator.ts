import type { RandomSource } from '../types/random.js';
import type { RangeLimits, ScanGenerator } from '../types/generator.js';
import { GeneratorKind } from '../types/enums.js';
import { ConfigError } from '../errors.js';
import { linspace, ordered } from './sequence.js';
import { requireCount, requireFinite, requireLevel } from './validate.js';

export class CentreSpanGenerator implements ScanGenerator {
  readonly kind = GeneratorKind.CENTRE_SPAN;

  constructor(
    readonly centre: number,
    readonly halfSpan: number,
    readonly numPoints: number,
    readonly randomiseOrder = false
  ) {
    requireFinite('centre', centre);
    requireFinite('halfSpan', halfSpan);
    if (halfSpan < 0) {
      throw new ConfigError(`halfSpan must not be negative, got ${halfSpan}`);
    }
    requireCount('numPoints', numPoints);
  }

  hasLevel(level: number): boolean {
    return requireLevel(level) === 0;
  }

  pointsForLevel(level: number, rng: RandomSource): Iterable<number> {
    if (!this.hasLevel(level)) return [];
    if (this.numPoints === 1) return [this.centre];
    const values = linspace(this.centre - this.halfSpan, this.centre + this.halfSpan, this.numPoints);
    return ordered(values, this.randomiseOrder, rng);
  }

  describeLimits(): RangeLimits {
    if (this.numPoints === 1) {
      return { min: this.centre, max: this.centre, increment: 0 };
    }
    return {
      min: this.centre - this.halfSpan,
      max: this.centre + this.halfSpan,
      increment: (2 * this.halfSpan) / (this.numPoints - 1)
    };
  }
}
