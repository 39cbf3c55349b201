/**
 * Seedable random streams
 *
 * Every sensor sample draws from its own stream, derived from the run seed,
 * the sensor id and the sample timestamp. Two samples never share a
 * generator, so sensors can be processed in any order (or concurrently)
 * and still reproduce the same values under a fixed seed.
 */

import seedrandom from 'seedrandom';

/** A deterministic random stream */
export interface RandomStream {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Normal(mean, stddev) via Box-Muller */
  gaussian(mean?: number, stddev?: number): number;
  /** Derive an independent child stream */
  fork(salt: string): RandomStream;
}

class SeededStream implements RandomStream {
  private readonly prng: seedrandom.PRNG;

  constructor(private readonly seed: string) {
    this.prng = seedrandom(seed);
  }

  next(): number {
    return this.prng();
  }

  gaussian(mean = 0, stddev = 1): number {
    if (stddev === 0) return mean;
    const u1 = Math.max(1e-12, this.prng());
    const u2 = this.prng();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + z * stddev;
  }

  fork(salt: string): RandomStream {
    return new SeededStream(`${this.seed}/${salt}`);
  }
}

/**
 * Build a seed string from its parts, e.g. `(runSeed, sensorId, timestamp)`
 */
export function deriveSeed(...parts: Array<string | number>): string {
  return JSON.stringify(parts);
}

/**
 * Create a random stream for a seed
 */
export function createRandomStream(seed: string | number): RandomStream {
  return new SeededStream(String(seed));
}

/**
 * Stream that always returns the distribution centre.
 * Useful for deterministic tests of stages that accept a stream.
 */
export const ZERO_NOISE_STREAM: RandomStream = {
  next: () => 0.5,
  gaussian: (mean = 0) => mean,
  fork: () => ZERO_NOISE_STREAM,
};
