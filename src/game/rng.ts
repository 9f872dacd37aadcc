/**
 * Xorshift32 seeded PRNG.
 * Each match owns one instance, so a seed plus the recorded inputs reproduce a run exactly.
 */
export class SeededRng {
  private state: number;

  constructor(seed: number) {
    // Zero is a fixed point of xorshift
    this.state = seed >>> 0 || 0x9e3779b9;
  }

  getState(): number {
    return this.state;
  }

  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /** Random integer in [min, max] (both ends inclusive) */
  nextInclusive(min: number, max: number): number {
    if (max <= min) {
      return min;
    }
    return min + (this.next() % (max - min + 1));
  }

  nextSign(): 1 | -1 {
    return (this.next() & 1) === 0 ? 1 : -1;
  }
}
