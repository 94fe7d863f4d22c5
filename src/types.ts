import { DType } from "@hamk-uas/jax-js-nonconsuming";

/** TypedArray type for float data - either Float32Array or Float64Array based on dtype */
export type FloatArray = Float32Array | Float64Array;

/**
 * Trajectory (Hankel) matrix of a series for window length L.
 *
 * Never stored as L×K cells: every entry is read from the series,
 * entry(row, col) = series[row + col] (0-based).
 */
export interface SsaTrajectory {
  /** Series length */
  readonly N: number;
  /** Window length (rows) */
  readonly L: number;
  /** Number of lagged columns, N - L + 1 */
  readonly K: number;
  /** Private copy of the input series */
  readonly series: Float64Array;
  /** Entry at (row, col), 0-based */
  at(row: number, col: number): number;
  /** Row i as a fresh array of length K */
  row(i: number): Float64Array;
  /** Materialized L×K nested array (SVD input) */
  toRows(): number[][];
  /** Squared Frobenius norm, computed from the series */
  frobeniusNormSq(): number;
}

/**
 * One component of the trajectory matrix factorization:
 *   X = Σᵢ sigma_i · u_i ⊗ v_i
 */
export interface EigenTriple {
  /** 1-based position in the descending ordering */
  readonly index: number;
  /** Singular value (≥ 0) */
  readonly sigma: number;
  /** Left singular vector, length L, unit norm (frozen) */
  readonly u: readonly number[];
  /** Factor vector, length K, unit norm (frozen) */
  readonly v: readonly number[];
}

/**
 * Result of factorizing a trajectory matrix. Immutable.
 *
 * `triples` holds the retained eigentriples ordered by sigma descending;
 * `rank` is min(L, K), the count a full factorization yields.
 */
export interface SsaDecomposition {
  readonly N: number;
  readonly L: number;
  readonly K: number;
  readonly rank: number;
  /**
   * Copy of the embedded series. Typed-array elements cannot be frozen;
   * writes here do not reach the eigentriples.
   */
  readonly series: Float64Array;
  readonly triples: readonly EigenTriple[];
  /** Squared Frobenius norm of the trajectory matrix */
  readonly normSq: number;
}

/** A named group of 1-based eigentriple indices */
export interface SsaGroup {
  readonly name: string;
  readonly indices: readonly number[];
}

/** Group specification as supplied by callers: name → indices */
export type GroupSpec = Readonly<Record<string, readonly number[]>>;

/** Output of ssaGroup: groups checked against one decomposition */
export interface SsaGrouping {
  readonly decomposition: SsaDecomposition;
  readonly groups: readonly SsaGroup[];
}

/** Reconstructed series keyed by group name */
export type SsaReconstruction = Record<string, FloatArray>;

/**
 * Convert a Float64 result to the TypedArray matching `dtype`.
 */
export function toFloatArray(data: Float64Array, dtype: DType): FloatArray {
  return dtype === DType.Float32 ? Float32Array.from(data) : data;
}

/**
 * Number of trajectory cells on each anti-diagonal k (0-based):
 *   w_k = min(k + 1, L, K, N - k)
 *
 * These are the divisors of diagonal averaging and the weights of the
 * w-correlation inner product.
 */
export function ssaWeights(N: number, L: number): Float64Array {
  const K = N - L + 1;
  const lo = Math.min(L, K);
  const w = new Float64Array(N);
  for (let k = 0; k < N; k++) w[k] = Math.min(k + 1, lo, N - k);
  return w;
}
