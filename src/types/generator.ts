import type { GeneratorKind } from './enums.js';
import type { RandomSource } from './random.js';

export interface RangeLimits {
  min?: number;
  max?: number;
  increment?: number;
}

export interface SetLimits {
  values: number[];
}

export type GeneratorLimits = RangeLimits | SetLimits;

export interface ScanGenerator {
  readonly kind: GeneratorKind;
  hasLevel(level: number): boolean;
  pointsForLevel(level: number, rng: RandomSource): Iterable<number>;
  describeLimits(): GeneratorLimits;
}
