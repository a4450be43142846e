import { randomInt } from 'node:crypto';
import { ConfigError } from '../errors.js';

export const MAX_SEED = 0xffffffff;

export function validateSeed(seed: number): number {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new ConfigError(`Seed must be an integer in [0, ${MAX_SEED}], got ${seed}`);
  }
  return seed;
}

export function resolveSeed(seed: number | null | undefined): number {
  if (seed === null || seed === undefined) {
    return randomInt(0, MAX_SEED + 1);
  }
  return validateSeed(seed);
}
