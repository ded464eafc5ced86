/**
 * Reflex Vacuum - Seeded RNG
 *
 * Mulberry32 PRNG so generated rooms are reproducible from a seed.
 */

export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed;
  }

  /**
   * Next number in [0, 1)
   */
  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextBool(probability: number = 0.5): boolean {
    return this.next() < probability;
  }
}
