import type { RandomSource } from '../types/random.js';
import type { RangeLimits, ScanGenerator } from '../types/generator.js';
import { GeneratorKind } from '../types/enums.js';
import { ConfigError } from '../errors.js';
import { ordered } from './sequence.js';
import { requireFinite, requireLevel, requirePositive } from './validate.js';

export interface ExpandingLimits {
  lower?: number;
  upper?: number;
}

/**
 * Starts at `centre` and grows outwards by `spacing` per level, dropping values that
 * leave the optional limits. Without limits there is no last level.
 */
export class ExpandingGenerator implements ScanGenerator {
  readonly kind = GeneratorKind.EXPANDING;

  constructor(
    readonly centre: number,
    readonly spacing: number,
    readonly randomiseOrder = false,
    readonly limits: ExpandingLimits = {}
  ) {
    requireFinite('centre', centre);
    requirePositive('spacing', spacing);
    if (limits.lower !== undefined) {
      requireFinite('limits.lower', limits.lower);
      if (limits.lower > centre) throw new ConfigError('Lower limit lies above the centre');
    }
    if (limits.upper !== undefined) {
      requireFinite('limits.upper', limits.upper);
      if (limits.upper < centre) throw new ConfigError('Upper limit lies below the centre');
    }
  }

  hasLevel(level: number): boolean {
    return requireLevel(level) === 0 || this.valuesForLevel(level).length > 0;
  }

  pointsForLevel(level: number, rng: RandomSource): Iterable<number> {
    requireLevel(level);
    if (level === 0) return [this.centre];
    return ordered(this.valuesForLevel(level), this.randomiseOrder, rng);
  }

  describeLimits(): RangeLimits {
    const limits: RangeLimits = { increment: this.spacing };
    if (this.limits.lower !== undefined) limits.min = this.limits.lower;
    if (this.limits.upper !== undefined) limits.max = this.limits.upper;
    return limits;
  }

  private valuesForLevel(level: number): number[] {
    const values: number[] = [];
    const below = this.centre - level * this.spacing;
    const above = this.centre + level * this.spacing;
    if (this.limits.lower === undefined || below >= this.limits.lower) values.push(below);
    if (this.limits.upper === undefined || above <= this.limits.upper) values.push(above);
    return values;
  }
}
