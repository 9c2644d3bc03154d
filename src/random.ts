/**
 * Seeded random stream shared by every stochastic operation of a run
 * (dirt sampling, neighbor choice, activation order).
 */

/** Seeds are unsigned 32-bit integers: [0, SEED_RANGE). */
export const SEED_RANGE = 4294967296;

export function randomSeed(): number {
  return Math.floor(Math.random() * SEED_RANGE);
}

export class RandomSource {
  readonly seed: number;
  private state: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.state = this.seed;
  }

  /**
   * Next float in [0, 1) (mulberry32).
   */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / SEED_RANGE;
  }

  /**
   * Integer in [0, bound).
   */
  nextInt(bound: number): number {
    return Math.floor(this.next() * bound);
  }

  choice<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.nextInt(items.length)];
  }

  /**
   * Fisher-Yates, in place. Returns the same array.
   */
  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      const tmp = items[i];
      items[i] = items[j];
      items[j] = tmp;
    }
    return items;
  }

  /**
   * Pick `count` distinct items (sampling without replacement).
   */
  sample<T>(items: readonly T[], count: number): T[] {
    const pool = [...items];
    const k = Math.max(0, Math.min(count, pool.length));
    for (let i = 0; i < k; i++) {
      const j = i + this.nextInt(pool.length - i);
      const tmp = pool[i];
      pool[i] = pool[j];
      pool[j] = tmp;
    }
    return pool.slice(0, k);
  }
}
