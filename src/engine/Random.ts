/**
 * Random.ts — Random sources shared by dice, generation and combat.
 *
 * Every engine call that draws randomness takes a RandomSource handle.
 * SeededRNG gives reproducible streams (same seed, same call order, same
 * result); `defaultRandom` wraps Math.random for casual use.
 */

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface RandomSource {
  /** Value in [0, 1). */
  next(): number;
  /** Integer in [min, max] (inclusive). */
  nextInt(min: number, max: number): number;
  /** Float in [min, max). */
  nextFloat(min: number, max: number): number;
  /** True with probability `p`. */
  chance(p: number): boolean;
  pick<T>(arr: readonly T[]): T;
  /** Shuffle in place (Fisher-Yates) and return the same array. */
  shuffle<T>(arr: T[]): T[];
  /** `count` distinct elements, in draw order. */
  sample<T>(arr: readonly T[], count: number): T[];
}

// ---------------------------------------------------------------------------
// Base implementation (everything derives from next())
// ---------------------------------------------------------------------------

export abstract class RandomBase implements RandomSource {
  abstract next(): number;

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  nextFloat(min: number, max: number): number {
    return this.next() * (max - min) + min;
  }

  chance(p: number): boolean {
    return this.next() < p;
  }

  pick<T>(arr: readonly T[]): T {
    if (arr.length === 0) {
      throw new RangeError('Cannot pick from an empty array');
    }
    return arr[this.nextInt(0, arr.length - 1)];
  }

  shuffle<T>(arr: T[]): T[] {
    for (let i = arr.length - 1; i > 0; i--) {
      const j = this.nextInt(0, i);
      const tmp = arr[i];
      arr[i] = arr[j];
      arr[j] = tmp;
    }
    return arr;
  }

  sample<T>(arr: readonly T[], count: number): T[] {
    const pool = [...arr];
    const picked: T[] = [];
    const n = Math.min(count, pool.length);
    for (let i = 0; i < n; i++) {
      const idx = this.nextInt(0, pool.length - 1);
      picked.push(pool[idx]);
      pool.splice(idx, 1);
    }
    return picked;
  }
}

/** Linear congruential generator. Deterministic for a given seed. */
export class SeededRNG extends RandomBase {
  private state: number;

  constructor(seed: number) {
    super();
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = ((this.state * 1664525 + 1013904223) & 0xFFFFFFFF) >>> 0;
    return this.state / 0x100000000;
  }
}

class MathRandom extends RandomBase {
  next(): number {
    return Math.random();
  }
}

export const defaultRandom: RandomSource = new MathRandom();

/** Seeded source when a seed is given, otherwise the Math.random source. */
export function createRandom(seed?: number): RandomSource {
  return seed === undefined ? defaultRandom : new SeededRNG(seed);
}
