import { ssaEmbed } from "./embed";
import { ssaFactorize } from "./decompose";
import type { DecomposeOptions } from "./options";
import type { SsaDecomposition } from "./types";

// Public type exports
export type {
  EigenTriple, FloatArray, GroupSpec, SsaDecomposition, SsaGroup, SsaGrouping,
  SsaReconstruction, SsaTrajectory,
} from "./types";
export type { DecomposeOptions, ReconstructOptions } from "./options";
export type { WCorrelationOptions } from "./wcor";
export type { SsaErrorCode } from "./errors";
export type { SyntheticOptions, SyntheticSeries } from "./synthetic";

export { ssaEmbed } from "./embed";
export { ssaFactorize } from "./decompose";
export { ssaGroup, ssaResidualIndices } from "./group";
export { ssaReconstruct, hankelize } from "./reconstruct";
export { ssaSingularValues, ssaContributions, ssaWCorrelation } from "./wcor";
export { ssaWeights, toFloatArray } from "./types";
export { createSsaLogger } from "./logger";
export { mulberry32, gaussianRng, syntheticSeries } from "./synthetic";
export {
  SsaError, EmptySeriesError, NonFiniteValueError, InvalidWindowLengthError,
  IndexOutOfRangeError, NumericFailureError, ShapeMismatchError, InvalidOptionsError,
} from "./errors";

/**
 * Singular Spectrum Analysis decomposition of a time series.
 *
 * Embeds the series with window length L into the L×K trajectory matrix
 * X[i][j] = series[i + j] (K = N - L + 1) and factorizes it into
 * eigentriples (σᵢ, uᵢ, vᵢ) ordered by σ descending:
 *
 *   X = Σᵢ σᵢ · uᵢ ⊗ vᵢ
 *
 * The window length is required; there is no automatic choice. Pass the
 * result to ssaReconstruct with a grouping of eigentriple indices
 * (1-based) to get component series back.
 *
 * @example
 * ```ts
 * const dec = ssaDecompose(y, 24);
 * const { trend, season } = await ssaReconstruct(dec, { trend: [1], season: [2, 3] });
 * ```
 *
 * @param series - Observations (N ≥ 2, finite)
 * @param L - Window length, integer in [2, N-1]
 * @param options - truncateTo, abort signal, logger
 * @throws EmptySeriesError when N < 2 (checked before L)
 * @throws InvalidWindowLengthError when L is outside [2, N-1]
 * @throws NumericFailureError when the SVD fails
 */
export function ssaDecompose(
  series: ArrayLike<number>,
  L: number,
  options: DecomposeOptions = {},
): SsaDecomposition {
  return ssaFactorize(ssaEmbed(series, L), options);
}
