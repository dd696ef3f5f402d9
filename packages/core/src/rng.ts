/**
 * Seeded PRNG (xorshift128+) for reproducible shuffles and fill colors.
 */
import type { Rng } from "./interfaces.js";

export class SeededRng implements Rng {
  private _s0: number;
  private _s1: number;
  private _seed: number;

  constructor(seed = 42) {
    this._seed = seed;
    this._s0 = seed;
    this._s1 = seed ^ 0xdeadbeef;
    // Warm up
    for (let i = 0; i < 20; i++) this.next();
  }

  seed(s: number): void {
    this._seed = s;
    this._s0 = s;
    this._s1 = s ^ 0xdeadbeef;
    for (let i = 0; i < 20; i++) this.next();
  }

  state(): number {
    return this._seed;
  }

  /** Returns a number in [0, 1). */
  next(): number {
    let s1 = this._s0;
    const s0 = this._s1;
    this._s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this._s1 = s1;
    return ((this._s0 + this._s1) >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max). */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min));
  }

  /** Fisher-Yates shuffle in place. */
  shuffle<T>(arr: T[]): T[] {
    for (let i = arr.length - 1; i > 0; i--) {
      const j = this.int(0, i + 1);
      const tmp = arr[i];
      arr[i] = arr[j];
      arr[j] = tmp;
    }
    return arr;
  }
}

/** Seed from the wall clock, for runs that don't ask for reproducibility. */
export function timeSeed(): number {
  return Date.now() & 0x7fffffff;
}
