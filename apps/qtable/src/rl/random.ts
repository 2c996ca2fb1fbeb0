import { RandomSource } from './types';

/**
 * Small deterministic PRNG (mulberry32) for repeatable training runs.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number = Date.now()) {
    // normalize seed to 32-bit unsigned
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(bound: number): number {
    return Math.floor(this.next() * bound);
  }
}

/**
 * Default source, seeded once per process.
 */
export const defaultRandom: RandomSource = new SeededRandom(Math.floor(Math.random() * 10000));
