/**
 * Embedding: series → trajectory (Hankel) matrix.
 *
 * For window length L the trajectory matrix is L×K with K = N - L + 1 and
 *
 *   X[i][j] = series[i + j]     (0-based)
 *
 * so every anti-diagonal i + j = k is constant and equal to series[k].
 * The matrix is a view over a private copy of the series; cells are
 * materialized only when toRows() is called for the SVD.
 */

import { EmptySeriesError, InvalidWindowLengthError, NonFiniteValueError } from "./errors";
import type { SsaTrajectory } from "./types";
import { ssaWeights } from "./types";

/**
 * Copy a caller series into a Float64Array, checking length and finiteness.
 * @internal
 */
export function toSeries(series: ArrayLike<number>): Float64Array {
  const n = series.length;
  if (n < 2) throw new EmptySeriesError(n);
  const out = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    const v = series[i];
    if (!Number.isFinite(v)) throw new NonFiniteValueError(i, v);
    out[i] = v;
  }
  return out;
}

/**
 * Build the trajectory matrix of `series` for window length `L`.
 *
 * @param series - Observations, N ≥ 2
 * @param L - Window length, integer in [2, N-1]
 */
export function ssaEmbed(series: ArrayLike<number>, L: number): SsaTrajectory {
  const x = toSeries(series);
  const N = x.length;
  if (!Number.isInteger(L) || L < 2 || L > N - 1) {
    throw new InvalidWindowLengthError(L, N);
  }
  const K = N - L + 1;

  const at = (row: number, col: number): number => {
    if (row < 0 || row >= L || col < 0 || col >= K) {
      throw new RangeError(`trajectory cell (${row}, ${col}) outside ${L}×${K}`);
    }
    return x[row + col];
  };

  return Object.freeze({
    N, L, K,
    series: x,
    at,
    row: (i: number) => {
      if (!Number.isInteger(i) || i < 0 || i >= L) {
        throw new RangeError(`trajectory row ${i} outside ${L}×${K}`);
      }
      return x.slice(i, i + K);
    },
    toRows: () => Array.from({ length: L }, (_, i) => Array.from(x.subarray(i, i + K))),
    // Each series value appears once per cell of its anti-diagonal.
    frobeniusNormSq: () => {
      const w = ssaWeights(N, L);
      let s = 0;
      for (let k = 0; k < N; k++) s += w[k] * x[k] * x[k];
      return s;
    },
  });
}
