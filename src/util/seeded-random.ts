/**
 * Small deterministic PRNG (xorshift32). Used to make retry jitter
 * reproducible when a seed is configured.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    // Force into uint32; zero would lock xorshift at zero.
    this.state = seed >>> 0 || 0x12345678;
  }

  private nextU32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /** Uniform float in [0, 1). */
  nextFloat(): number {
    return this.nextU32() / 0x1_0000_0000;
  }

  /** A `() => number` source bound to this generator. */
  source(): () => number {
    return () => this.nextFloat();
  }
}
