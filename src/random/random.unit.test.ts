import { describe, expect, it } from 'vitest';
import { Mulberry32 } from './Mulberry32.js';
import { shuffleInPlace } from './shuffle.js';
import { MAX_SEED, resolveSeed, validateSeed } from './seed.js';
import { ConfigError } from '../errors.js';

describe('Mulberry32', () => {
  it('produces the reference stream', () => {
    const rng = new Mulberry32(1);
    expect([rng.nextUint32(), rng.nextUint32(), rng.nextUint32()]).toEqual([2693262067, 11749833, 2265367787]);
  });

  it('keeps floats and ints in range', () => {
    const rng = new Mulberry32(99);
    for (let i = 0; i < 200; i += 1) {
      const f = rng.nextFloat();
      expect(f).toBeGreaterThanOrEqual(0);
      expect(f).toBeLessThan(1);
      const n = rng.nextInt(7);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(7);
    }
  });
});

describe('shuffleInPlace', () => {
  it('permutes in place', () => {
    const items = [0, 1, 2, 3, 4];
    const result = shuffleInPlace(items, new Mulberry32(42));
    expect(result).toBe(items);
    expect(items).toEqual([0, 4, 2, 1, 3]);
  });

  it('leaves short lists alone', () => {
    expect(shuffleInPlace([], new Mulberry32(1))).toEqual([]);
    expect(shuffleInPlace(['x'], new Mulberry32(1))).toEqual(['x']);
  });
});

describe('seeds', () => {
  it('validates the 32-bit range', () => {
    expect(validateSeed(0)).toBe(0);
    expect(validateSeed(MAX_SEED)).toBe(MAX_SEED);
    expect(() => validateSeed(-1)).toThrow(ConfigError);
    expect(() => validateSeed(MAX_SEED + 1)).toThrow(ConfigError);
    expect(() => validateSeed(1.5)).toThrow(ConfigError);
  });

  it('keeps a given seed and draws a fresh one otherwise', () => {
    expect(resolveSeed(7)).toBe(7);
    const drawn = resolveSeed(null);
    expect(Number.isInteger(drawn)).toBe(true);
    expect(drawn).toBeGreaterThanOrEqual(0);
    expect(drawn).toBeLessThanOrEqual(MAX_SEED);
  });
});
