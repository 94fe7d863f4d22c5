/**
 * Seeded synthetic signals for tests, demos and scripts.
 *
 * Nothing here is used by the decomposition itself; randomness enters only
 * through an explicit seed.
 */

/**
 * Mulberry32: simple 32-bit PRNG with period 2³².
 * Returns uniform random numbers in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let a = seed | 0;
  return () => {
    a = (a + 0x6D2B79F5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Box-Muller transform: converts uniform [0,1) samples to N(0,1).
 * Generates pairs; caches the spare for the next call.
 */
export function gaussianRng(uniform: () => number): () => number {
  let spare: number | null = null;
  return () => {
    if (spare !== null) {
      const val = spare;
      spare = null;
      return val;
    }
    let u1: number;
    do { u1 = uniform(); } while (u1 === 0);
    const u2 = uniform();
    const mag = Math.sqrt(-2 * Math.log(u1));
    spare = mag * Math.sin(2 * Math.PI * u2);
    return mag * Math.cos(2 * Math.PI * u2);
  };
}

/** Parameters of syntheticSeries */
export interface SyntheticOptions {
  /** Number of samples */
  n: number;
  /** Period of the sinusoid in samples (default: 12) */
  period?: number;
  /** Sinusoid amplitude (default: 1) */
  amplitude?: number;
  /** Linear trend slope per sample (default: 0) */
  slope?: number;
  /** Gaussian noise standard deviation (default: 0) */
  noiseStd?: number;
  /** PRNG seed (default: 42) */
  seed?: number;
  /** Index of the first sample, i.e. t starts here (default: 0) */
  start?: number;
}

/** Noisy series together with the noiseless signal it was drawn around */
export interface SyntheticSeries {
  t: number[];
  y: number[];
  clean: number[];
}

/**
 * Generate y[t] = slope·t + amplitude·sin(2πt/period) + noise,
 * for t = start, …, start + n - 1.
 */
export function syntheticSeries(options: SyntheticOptions): SyntheticSeries {
  const {
    n,
    period = 12,
    amplitude = 1,
    slope = 0,
    noiseStd = 0,
    seed = 42,
    start = 0,
  } = options;
  const noise = gaussianRng(mulberry32(seed));
  const t = Array.from({ length: n }, (_, i) => start + i);
  const clean = t.map((ti) => slope * ti + amplitude * Math.sin(2 * Math.PI * ti / period));
  const y = clean.map((c) => (noiseStd > 0 ? c + noiseStd * noise() : c));
  return { t, y, clean };
}
