import { range, rollDice } from "./rng";

/**
 * Deterministic PRNG using the xoshiro128++ algorithm.
 *
 * - Four 32-bit state words seeded through SplitMix32
 * - Returns a double in [0, 1)
 * - State can be saved and restored, so a level can be replayed from
 *   any point of the stream
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * State type for xoshiro128++ (4 x 32-bit words)
 */
export type RngState = [number, number, number, number];

/**
 * The random source every generation step draws from. One instance is
 * created per level request and handed down explicitly; call order
 * defines the output for a given seed.
 */
export interface RandomSource {
  next(): number;
  range(min: number, max: number): number;
  rollDice(count: number, sides: number): number;
}

export class SeededRandom implements RandomSource {
  private s: RngState;

  constructor(seed: number) {
    const mix = splitmix32(seed >>> 0);
    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro requires at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;

    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  /**
   * Next random number in [0, 1)
   */
  next(): number {
    return this.next32() / 0x100000000;
  }

  /**
   * Random integer between min and max (inclusive)
   */
  range(min: number, max: number): number {
    return range(() => this.next(), min, max);
  }

  /**
   * Sum of `count` rolls of a `sides`-faced die, e.g. `rollDice(1, 6)`
   * for 1d6.
   */
  rollDice(count: number, sides: number): number {
    return rollDice(() => this.next(), count, sides);
  }

  getState(): RngState {
    const [a, b, c, d] = this.s;
    return [a, b, c, d];
  }

  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}
