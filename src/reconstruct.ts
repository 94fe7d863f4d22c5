import { DType, numpy as np } from "@hamk-uas/jax-js-nonconsuming";
import { InvalidOptionsError, ShapeMismatchError } from "./errors";
import { ssaGroup } from "./group";
import { resolveReconstructOptions, type ReconstructOptions } from "./options";
import type { FloatArray, GroupSpec, SsaDecomposition, SsaGrouping, SsaReconstruction } from "./types";
import { toFloatArray } from "./types";

/**
 * Diagonal averaging (Hankelization) of a row-major L×K matrix.
 *
 * Output position k (0-based, N = L + K - 1 positions) is the mean of the
 * cells on anti-diagonal i + j = k:
 *
 *   y[k] = mean{ M[i][k - i] : max(0, k-K+1) ≤ i ≤ min(L-1, k) }
 *
 * Interior positions average min(L, K) cells, the ends fewer.
 */
export function hankelize(data: ArrayLike<number>, L: number, K: number): Float64Array {
  if (data.length !== L * K) {
    throw new RangeError(`hankelize: expected ${L}×${K}=${L * K} cells, got ${data.length}`);
  }
  const N = L + K - 1;
  const out = new Float64Array(N);
  for (let k = 0; k < N; k++) {
    const lo = Math.max(0, k - K + 1);
    const hi = Math.min(L - 1, k);
    let s = 0;
    for (let i = lo; i <= hi; i++) s += data[i * K + (k - i)];
    out[k] = s / (hi - lo + 1);
  }
  return out;
}

/**
 * Partial trajectory matrix M = Σ_{i∈indices} σᵢ · uᵢ ⊗ vᵢ, row-major.
 *
 * Computed as (U·diag(σ)) @ Vᵀ: [L, r] @ [r, K] → [L, K].
 * @internal
 */
async function groupMatrix(
  decomposition: SsaDecomposition,
  indices: readonly number[],
  dtype: DType,
): Promise<ArrayLike<number>> {
  const { L } = decomposition;
  const selected = indices.map((i) => decomposition.triples[i - 1]);

  const US_data: number[][] = Array.from({ length: L }, (_, row) =>
    selected.map((t) => t.sigma * t.u[row]),
  );
  const Vt_data: number[][] = selected.map((t) => Array.from(t.v));

  using US = np.array(US_data, { dtype });
  using Vt = np.array(Vt_data, { dtype });
  const M = np.matmul(US, Vt);
  return await M.consumeData() as ArrayLike<number>;
}

/**
 * Reconstruct one index set as a length-N series (Float64).
 * An empty index set gives all zeros.
 * @internal
 */
export async function reconstructIndices(
  decomposition: SsaDecomposition,
  indices: readonly number[],
  dtype: DType = DType.Float64,
): Promise<Float64Array> {
  const { N, L, K } = decomposition;
  if (indices.length === 0) return new Float64Array(N);
  return hankelize(await groupMatrix(decomposition, indices, dtype), L, K);
}

const isGrouping = (groups: GroupSpec | SsaGrouping): groups is SsaGrouping =>
  "decomposition" in groups && "groups" in groups &&
  !Array.isArray(groups.decomposition) && Array.isArray(groups.groups);

/**
 * Reconstruct a time series for each group.
 *
 * For every group g the partial matrix M_g = Σ_{i∈g} σᵢ·uᵢ⊗vᵢ is formed and
 * diagonal-averaged back onto the time axis. Reconstruction is linear in
 * the index set: groups that together hold all eigentriples of an
 * untruncated decomposition sum to the original series.
 *
 * @param decomposition - Result of ssaDecompose / ssaFactorize
 * @param groups - Group spec (name → 1-based indices) or a grouping from ssaGroup
 * @param options - dtype (default Float64), abort signal, logger
 * @returns Series of length N per group, in group order
 * @throws IndexOutOfRangeError for indices outside [1, d]
 * @throws ShapeMismatchError if a reconstructed series does not have length N
 */
export async function ssaReconstruct(
  decomposition: SsaDecomposition,
  groups: GroupSpec | SsaGrouping,
  options: ReconstructOptions = {},
): Promise<SsaReconstruction> {
  const { dtype, signal, logger } = resolveReconstructOptions(options);
  const grouping = isGrouping(groups) ? groups : ssaGroup(decomposition, groups);
  if (grouping.decomposition !== decomposition) {
    throw new InvalidOptionsError("grouping", ["grouping was built for a different decomposition"]);
  }

  const { N } = decomposition;
  const entries: [string, FloatArray][] = [];

  for (const { name, indices } of grouping.groups) {
    signal?.throwIfAborted();
    logger.debug(`reconstructing group "${name}" from ${indices.length} eigentriple(s)`);
    const series = await reconstructIndices(decomposition, indices, dtype);
    if (series.length !== N) throw new ShapeMismatchError(name, N, series.length);
    entries.push([name, toFloatArray(series, dtype)]);
  }

  return Object.fromEntries(entries);
}
