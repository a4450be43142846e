import type { RandomSource } from '../types/random.js';
import { shuffleInPlace } from '../random/shuffle.js';

export function* linspace(start: number, stop: number, count: number): Generator<number> {
  if (count === 1) {
    yield start;
    return;
  }
  const last = count - 1;
  for (let i = 0; i < count; i += 1) {
    // endpoints are emitted verbatim so they survive rounding
    yield i === last ? stop : start + ((stop - start) * i) / last;
  }
}

export function ordered(values: Iterable<number>, randomise: boolean, rng: RandomSource): Iterable<number> {
  if (!randomise) return values;
  return shuffleInPlace(Array.from(values), rng);
}
