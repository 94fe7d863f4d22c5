/**
 * Factorization of a trajectory matrix into eigentriples.
 *
 * The dense SVD itself comes from ml-matrix (one-sided Golub–Kahan, the
 * JAMA algorithm). This module owns what happens around it: input checks,
 * descending ordering, truncation, and turning numerical trouble into
 * NumericFailureError.
 */

import { Matrix, SingularValueDecomposition } from "ml-matrix";
import { InvalidWindowLengthError, NumericFailureError } from "./errors";
import { resolveDecomposeOptions, type DecomposeOptions } from "./options";
import type { EigenTriple, SsaDecomposition, SsaTrajectory } from "./types";

const allFinite = (a: ArrayLike<number>): boolean => {
  for (let i = 0; i < a.length; i++) if (!Number.isFinite(a[i])) return false;
  return true;
};

/**
 * Factorize a trajectory matrix X (L×K) as X = Σᵢ σᵢ · uᵢ ⊗ vᵢ.
 *
 * Eigentriples are ordered by σ descending; equal values keep the order the
 * SVD produced them in. With `truncateTo` only the leading triples are kept
 * (values above min(L, K) are clamped).
 *
 * The factorization is synchronous and runs to completion once started:
 * `signal` is checked on entry only, so an already-aborted signal stops the
 * call but a timeout cannot interrupt the SVD. Cancellation between groups
 * happens in ssaReconstruct.
 *
 * @throws InvalidWindowLengthError when L or K is below 1
 * @throws NumericFailureError when the SVD throws or yields non-finite values
 */
export function ssaFactorize(
  trajectory: SsaTrajectory,
  options: DecomposeOptions = {},
): SsaDecomposition {
  const { truncateTo, signal, logger } = resolveDecomposeOptions(options);
  const { N, L, K } = trajectory;
  if (!(L >= 1 && K >= 1)) {
    throw new InvalidWindowLengthError(L, N, `trajectory matrix must be at least 1×1, got ${L}×${K}`);
  }
  signal?.throwIfAborted();

  const rank = Math.min(L, K);
  logger.debug(`factorizing ${L}×${K} trajectory matrix (N=${N})`);

  let svd: SingularValueDecomposition;
  try {
    svd = new SingularValueDecomposition(new Matrix(trajectory.toRows()), { autoTranspose: true });
  } catch (err) {
    throw new NumericFailureError(`SVD of the ${L}×${K} trajectory matrix failed`, { cause: err });
  }

  const sigmas = svd.diagonal;
  const U = svd.leftSingularVectors;
  const V = svd.rightSingularVectors;
  if (sigmas.length < rank || U.rows !== L || V.rows !== K || U.columns < rank || V.columns < rank) {
    throw new NumericFailureError(
      `SVD returned ${sigmas.length} values with U ${U.rows}×${U.columns}, V ${V.rows}×${V.columns} for a ${L}×${K} matrix`,
    );
  }
  if (!allFinite(sigmas.slice(0, rank))) {
    throw new NumericFailureError("SVD produced non-finite singular values");
  }

  // Array.prototype.sort is stable, so ties keep SVD order.
  const order = Array.from({ length: rank }, (_, i) => i).sort((a, b) => sigmas[b] - sigmas[a]);

  let keep = rank;
  if (truncateTo !== undefined) {
    if (truncateTo > rank) logger.debug(`truncateTo=${truncateTo} exceeds rank ${rank}; keeping all`);
    keep = Math.min(truncateTo, rank);
  }

  const triples: EigenTriple[] = [];
  for (let r = 0; r < keep; r++) {
    const c = order[r];
    const u = Object.freeze(U.getColumn(c));
    const v = Object.freeze(V.getColumn(c));
    if (!allFinite(u) || !allFinite(v)) {
      throw new NumericFailureError(`SVD produced non-finite singular vectors for component ${r + 1}`);
    }
    triples.push(Object.freeze({ index: r + 1, sigma: Math.max(0, sigmas[c]), u, v }));
  }

  logger.debug(`kept ${keep} of ${rank} eigentriples, sigma_1=${triples[0]?.sigma ?? 0}`);

  return Object.freeze({
    N, L, K, rank,
    series: Float64Array.from(trajectory.series),
    triples: Object.freeze(triples),
    normSq: trajectory.frobeniusNormSq(),
  });
}
