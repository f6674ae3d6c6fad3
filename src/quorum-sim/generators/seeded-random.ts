/**
 * Quorum Sim - Seeded Random
 *
 * Reproducible random source for the simulation.
 * Every draw in a run goes through one instance, so a seed fully
 * determines the resulting curve.
 */

// ============================================
// SEEDED RANDOM NUMBER GENERATOR
// ============================================

/** Golden-ratio increment used to space out derived stream seeds */
const STREAM_SEED_STEP = 0x9e3779b9;

/**
 * Seeded PRNG (Mulberry32)
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Generate next random number in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Generate random integer in [min, max] */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Bernoulli trial */
  chance(probability: number): boolean {
    return this.next() < probability;
  }

  /**
   * Number of successes in `trials` independent Bernoulli(probability) trials
   */
  binomial(trials: number, probability: number): number {
    if (probability <= 0) return 0;
    if (probability >= 1) return trials;

    let successes = 0;
    for (let i = 0; i < trials; i++) {
      if (this.chance(probability)) {
        successes++;
      }
    }
    return successes;
  }

  /**
   * Pick `count` distinct indices from [0, size) without replacement.
   * Partial Fisher-Yates: every count-subset is equally likely.
   */
  sampleIndices(size: number, count: number): number[] {
    const take = Math.min(count, size);
    const pool = Array.from({ length: size }, (_, i) => i);

    for (let i = 0; i < take; i++) {
      const j = this.nextInt(i, size - 1);
      const swap = pool[i];
      pool[i] = pool[j];
      pool[j] = swap;
    }

    return pool.slice(0, take);
  }

  /**
   * Derive an independent generator for stream `index`.
   * Streams derived from equal states are equal.
   */
  fork(index: number): SeededRandom {
    return new SeededRandom((this.state + Math.imul(index + 1, STREAM_SEED_STEP)) >>> 0);
  }

  /** Get current seed state (for reproduction) */
  getState(): number {
    return this.state;
  }
}

/** Draw a fresh 32-bit seed when the caller did not supply one */
export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296) >>> 0;
}

export function createSeededRandom(seed: number): SeededRandom {
  return new SeededRandom(seed);
}
