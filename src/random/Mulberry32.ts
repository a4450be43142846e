import type { RandomSource } from '../types/random.js';

const UINT32_RANGE = 4294967296;

/**
 * Small seeded PRNG (mulberry32). The whole stream is fixed by the 32-bit seed.
 */
export class Mulberry32 implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  nextFloat(): number {
    return this.nextUint32() / UINT32_RANGE;
  }

  nextInt(bound: number): number {
    return Math.floor(this.nextFloat() * bound);
  }
}
