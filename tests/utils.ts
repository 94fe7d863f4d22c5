/**
 * Test utility functions for ssa-js
 */

import { checkLeaks } from '@hamk-uas/jax-js-nonconsuming';
import type { SsaTrajectory } from '../src/index';

/**
 * Run `fn` inside a checkLeaks guard. Throws if any np.Array objects leak.
 * Use this to wrap every `ssaReconstruct`/`ssaWCorrelation` call in tests.
 *
 * @example
 * const rec = await withLeakCheck(() => ssaReconstruct(dec, { all: [1, 2] }));
 */
export const withLeakCheck = async <T>(fn: () => Promise<T>): Promise<T> => {
  const guard = checkLeaks.start();
  try {
    return await fn();
  } finally {
    checkLeaks.stop(guard);
  }
};

/** Largest elementwise |a[i] - b[i]|; throws on length mismatch. */
export function maxAbsDiff(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new Error(`length mismatch: ${a.length} vs ${b.length}`);
  }
  let m = 0;
  for (let i = 0; i < a.length; i++) m = Math.max(m, Math.abs(a[i] - b[i]));
  return m;
}

/** Root mean square of a[i] - b[i]. */
export function rmse(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += (a[i] - b[i]) ** 2;
  return Math.sqrt(s / a.length);
}

/** Elementwise sum of two equal-length arrays. */
export function addArrays(a: ArrayLike<number>, b: ArrayLike<number>): number[] {
  return Array.from({ length: a.length }, (_, i) => a[i] + b[i]);
}

/** Dot product of two equal-length vectors. */
export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i] * b[i];
  return s;
}

/**
 * Hand-built trajectory whose rows are supplied directly, for feeding
 * shapes into ssaFactorize that ssaEmbed refuses to build.
 */
export function fakeTrajectory(rows: number[][], L: number, K: number): SsaTrajectory {
  const N = L + K - 1;
  return {
    N, L, K,
    series: new Float64Array(Math.max(N, 0)),
    at: (i, j) => rows[i][j],
    row: (i) => Float64Array.from(rows[i]),
    toRows: () => rows,
    frobeniusNormSq: () => rows.flat().reduce((s, v) => s + v * v, 0),
  };
}
