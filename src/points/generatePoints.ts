import type { ScanGenerator } from '../types/generator.js';
import type { RandomSource } from '../types/random.js';
import type { Point, ResolvedScanOptions } from '../types/scan.js';
import { ConfigError } from '../errors.js';
import { Mulberry32 } from '../random/Mulberry32.js';
import { shuffleInPlace } from '../random/shuffle.js';

export type PointOptions = Pick<ResolvedScanOptions, 'numRepeats' | 'randomiseOrderGlobally' | 'seed'>;

function* crossProduct(axisValues: readonly number[][]): Generator<Point> {
  if (axisValues.some((values) => values.length === 0)) return;
  const indices = axisValues.map(() => 0);
  while (true) {
    yield axisValues.map((values, axis) => values[indices[axis]]);
    // odometer: the last axis turns fastest
    let axis = axisValues.length - 1;
    while (axis >= 0) {
      indices[axis] += 1;
      if (indices[axis] < axisValues[axis].length) break;
      indices[axis] = 0;
      axis -= 1;
    }
    if (axis < 0) return;
  }
}

function levelZeroValues(generators: readonly ScanGenerator[], rng: RandomSource): number[][] {
  return generators.map((generator) => Array.from(generator.pointsForLevel(0, rng)));
}

/**
 * Combines the level-0 sequences of the given axes into one single-pass stream of
 * points, repeat-major and last axis fastest. With `randomiseOrderGlobally` the
 * points of all repeats are shuffled together instead. The order is fully determined
 * by the generators and the seed.
 */
export function* generatePoints(generators: readonly ScanGenerator[], options: PointOptions): Generator<Point> {
  if (!Number.isInteger(options.numRepeats) || options.numRepeats < 1) {
    throw new ConfigError(`numRepeats must be a positive integer, got ${options.numRepeats}`);
  }
  const rng = new Mulberry32(options.seed);

  if (!options.randomiseOrderGlobally) {
    for (let repeat = 0; repeat < options.numRepeats; repeat += 1) {
      yield* crossProduct(levelZeroValues(generators, rng));
    }
    return;
  }

  const points: Point[] = [];
  for (let repeat = 0; repeat < options.numRepeats; repeat += 1) {
    for (const point of crossProduct(levelZeroValues(generators, rng))) {
      points.push(point);
    }
  }
  yield* shuffleInPlace(points, rng);
}

/**
 * Empty points forever; drives axis-less scans that repeat until paused.
 */
export function* continuousPoints(): Generator<Point> {
  while (true) {
    yield [];
  }
}
