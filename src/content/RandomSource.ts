/**
 * Source of uniform numbers in [0, 1) used to pick copy variants.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Mulberry32: small, fast and good enough for picking phrasing variants.
 */
class SeededRandomSource implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

const unseeded: RandomSource = { next: () => Math.random() };

/**
 * Creates a random source; pass a seed to make variant selection repeatable.
 */
export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? unseeded : new SeededRandomSource(seed);
}

/**
 * Picks one element uniformly.
 */
export function pick<T>(random: RandomSource, items: readonly [T, ...T[]]): T {
  const index = Math.min(Math.floor(random.next() * items.length), items.length - 1);
  return items[index] ?? items[0];
}
