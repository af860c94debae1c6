/**
 * Seeded pseudo-random source
 *
 * One instance is created per run and handed to everything that draws
 * identifiers. Not cryptographically secure: uniformity only.
 */

import { RandomSourceError } from './errors.js';

const UINT32_RANGE = 0x1_0000_0000;

/**
 * Anything that can hand out uniform integers in [0, bound)
 */
export interface RandomSource {
  nextInt(bound: number): number;
}

/**
 * mulberry32 generator with rejection sampling on top.
 *
 * Each nextInt call runs to completion before any other task on the event
 * loop, so a single instance can be shared by concurrent folder workers.
 */
export class SeededRandom implements RandomSource {
  private state: number;
  readonly seed: number;

  constructor(seed: number = Date.now()) {
    if (!Number.isFinite(seed)) {
      throw new RandomSourceError(`Seed must be a finite number, got ${seed}`);
    }
    this.seed = seed;
    this.state = Math.trunc(seed) >>> 0;
  }

  /**
   * Next raw 32-bit value
   */
  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0 || bound > UINT32_RANGE) {
      throw new RandomSourceError(`Bound must be an integer in [1, 2^32], got ${bound}`);
    }

    // Values at or above the last full multiple of bound would skew the low residues
    const limit = UINT32_RANGE - (UINT32_RANGE % bound);
    let value = this.nextUint32();
    while (value >= limit) {
      value = this.nextUint32();
    }
    return value % bound;
  }
}
