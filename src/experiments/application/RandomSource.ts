// src/experiments/application/RandomSource.ts

/**
 * Seedable random source and the distributions the significance engine draws from.
 *
 * A seeded source replays the same stream, so tests can assert exact outputs.
 * Production creates an auto-seeded source per evaluation.
 */

import { MersenneTwister19937, Random } from 'random-js';

export interface RandomSource {
  /**
   * Uniform draw from the open interval (0, 1).
   */
  uniform(): number;
}

export type RandomSourceFactory = () => RandomSource;

export function createRandomSource(seed?: number): RandomSource {
  const engine =
    seed !== undefined ? MersenneTwister19937.seed(seed) : MersenneTwister19937.autoSeed();
  const random = new Random(engine);

  return {
    uniform(): number {
      let u = random.real(0, 1, false);
      // real() is [0, 1); log(0) would poison the samplers below
      while (u === 0) {
        u = random.real(0, 1, false);
      }
      return u;
    },
  };
}

/**
 * Box-Muller transform; the second variate is discarded.
 */
export function sampleStandardNormal(rng: RandomSource): number {
  const u1 = rng.uniform();
  const u2 = rng.uniform();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * Gamma(shape, 1) via Marsaglia & Tsang (2000).
 * Shapes below 1 are boosted with the U^(1/shape) identity.
 */
export function sampleGamma(shape: number, rng: RandomSource): number {
  if (!(shape > 0)) {
    throw new RangeError(`Gamma shape must be positive, got ${shape}`);
  }

  if (shape < 1) {
    return sampleGamma(shape + 1, rng) * Math.pow(rng.uniform(), 1 / shape);
  }

  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);

  for (;;) {
    let x: number;
    let v: number;
    do {
      x = sampleStandardNormal(rng);
      v = 1 + c * x;
    } while (v <= 0);

    v = v * v * v;
    const u = rng.uniform();
    const x2 = x * x;

    if (u < 1 - 0.0331 * x2 * x2) return d * v;
    if (Math.log(u) < 0.5 * x2 + d * (1 - v + Math.log(v))) return d * v;
  }
}

/**
 * Beta(a, b) as X / (X + Y) with X ~ Gamma(a), Y ~ Gamma(b).
 */
export function sampleBeta(a: number, b: number, rng: RandomSource): number {
  const x = sampleGamma(a, rng);
  const y = sampleGamma(b, rng);
  return x / (x + y);
}
