/**
 * Floor Plan Search - Random Source
 *
 * Every stochastic step takes its randomness from an explicit handle so that
 * a seed reproduces a run exactly and parallel workers never share a stream.
 */

/**
 * Minimal source of uniform numbers in [0, 1)
 */
export interface RandomSource {
  next(): number;
}

/**
 * Deterministic PRNG (mulberry32) with the sampling helpers the search uses.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /**
   * Next number in [0, 1)
   */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Uniform number between a and b. Order of the bounds does not matter.
   */
  uniform(a: number, b: number): number {
    return a + (b - a) * this.next();
  }

  /**
   * Integer in [min, max] (inclusive)
   */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /**
   * True with the given probability
   */
  chance(probability: number): boolean {
    return this.next() < probability;
  }

  choice<T>(items: readonly [T, ...T[]]): T;
  choice<T>(items: readonly T[]): T | undefined;
  choice<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.int(0, items.length - 1)];
  }

  /**
   * Picks `count` distinct positions of `items` (without replacement).
   * Returns fewer elements when `items` is shorter than `count`.
   */
  sample<T>(items: readonly T[], count: number): T[] {
    return this.shuffle(items).slice(0, count);
  }

  /**
   * Fisher-Yates shuffle into a new array
   */
  shuffle<T>(items: readonly T[]): T[] {
    const result = Array.from(items);
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      const tmp = result[i];
      result[i] = result[j];
      result[j] = tmp;
    }
    return result;
  }

  /**
   * Derives an independent generator seeded from this stream
   */
  fork(): SeededRandom {
    return new SeededRandom(Math.floor(this.next() * 4294967296));
  }
}

/**
 * Creates a seeded generator. Without a seed, one is drawn from Math.random.
 */
export function createRandom(seed?: number): SeededRandom {
  return new SeededRandom(seed ?? Math.floor(Math.random() * 4294967296));
}
