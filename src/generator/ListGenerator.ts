import type { RandomSource } from '../types/random.js';
import type { ScanGenerator, SetLimits } from '../types/generator.js';
import { GeneratorKind } from '../types/enums.js';
import { ordered } from './sequence.js';
import { requireFinite, requireLevel } from './validate.js';

export class ListGenerator implements ScanGenerator {
  readonly kind = GeneratorKind.LIST;
  readonly values: readonly number[];

  constructor(values: readonly number[], readonly randomiseOrder = false) {
    values.forEach((value, index) => requireFinite(`values[${index}]`, value));
    this.values = Object.freeze([...values]);
  }

  hasLevel(level: number): boolean {
    return requireLevel(level) === 0;
  }

  pointsForLevel(level: number, rng: RandomSource): Iterable<number> {
    if (!this.hasLevel(level)) return [];
    return ordered(this.values, this.randomiseOrder, rng);
  }

  describeLimits(): SetLimits {
    return { values: [...this.values] };
  }
}
