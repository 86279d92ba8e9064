/**
 * Seeded deterministic RNG for the quarterly engine.
 *
 * Uses Mulberry32, a small 32-bit PRNG. The same seed always produces the
 * same sequence, and the whole generator state is one integer, so a session
 * can persist `getState()` and resume the exact stream later.
 *
 * The engine only ever sees the `Rng` interface and draws from the single
 * instance passed to `advance`.
 */

export interface Rng {
  /** Integer in [minInclusive, maxExclusive). */
  nextInt(minInclusive: number, maxExclusive: number): number;
  /** Float in [0, 1). */
  nextDouble(): number;
  /** Fisher-Yates shuffle (in-place, returns same array) */
  shuffle<T>(list: T[]): T[];
}

// ── Mulberry32 PRNG ──────────────────────────────────────────────

export class SeededRng implements Rng {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0; // ensure 32-bit integer
  }

  static fromState(state: number): SeededRng {
    const rng = new SeededRng(0);
    rng.state = state | 0;
    return rng;
  }

  getState(): number {
    return this.state;
  }

  nextDouble(): number {
    this.state |= 0;
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(minInclusive: number, maxExclusive: number): number {
    if (maxExclusive <= minInclusive) {
      throw new Error(`Empty range: [${minInclusive}, ${maxExclusive})`);
    }
    return Math.floor(this.nextDouble() * (maxExclusive - minInclusive)) + minInclusive;
  }

  shuffle<T>(list: T[]): T[] {
    for (let i = list.length - 1; i > 0; i--) {
      const j = Math.floor(this.nextDouble() * (i + 1));
      const temp = list[i];
      list[i] = list[j];
      list[j] = temp;
    }
    return list;
  }
}

/** Picks one element with a single draw; undefined for an empty list. */
export function pickOne<T>(rng: Rng, list: readonly T[]): T | undefined {
  if (list.length === 0) return undefined;
  return list[rng.nextInt(0, list.length)];
}

/** Generate a random seed for non-replay games */
export function generateRandomSeed(): number {
  return (Math.random() * 0x7fffffff) | 0;
}
