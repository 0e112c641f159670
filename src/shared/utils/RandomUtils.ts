import seedrandom from "seedrandom";

/**
 * A source of uniformly distributed floats in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

/**
 * Builds a seedrandom-backed source. Without a seed the generator is
 * seeded from system entropy.
 */
export function createSeededSource(seed?: string): RandomSource {
  const rng = seed === undefined ? seedrandom() : seedrandom(seed);
  return { next: () => rng() };
}

/**
 * Random number helpers over an injected source.
 * Every random decision of a simulation goes through one instance so a
 * seeded or scripted source makes whole runs reproducible.
 */
export class RandomUtils {
  constructor(private readonly source: RandomSource) {}

  /**
   * Returns a random integer between min (inclusive) and max (inclusive).
   */
  public intRange(min: number, max: number): number {
    return Math.floor(this.source.next() * (max - min + 1)) + min;
  }

  /**
   * Returns true with the specified probability (0-1).
   */
  public chance(probability: number): boolean {
    return this.source.next() < probability;
  }

  /**
   * Returns a random element from an array.
   */
  public element<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined;
    return array[Math.floor(this.source.next() * array.length)];
  }

  /**
   * Shuffles an array in place.
   */
  public shuffle<T>(array: T[]): T[] {
    for (let i = array.length - 1; i > 0; i--) {
      const j = Math.floor(this.source.next() * (i + 1));
      [array[i], array[j]] = [array[j], array[i]];
    }
    return array;
  }
}
