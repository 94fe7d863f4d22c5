/**
 * Diagnostics over a decomposition: singular spectrum, eigenvalue
 * contributions and the weighted-correlation (w-correlation) matrix.
 *
 * w-correlation measures separability of reconstructed components under
 * the inner product that diagonal averaging induces:
 *
 *   ⟨F, G⟩_w = Σ_k w_k · F[k] · G[k],   w_k = min(k+1, L, K, N-k)
 *   ρ(F, G)  = ⟨F, G⟩_w / (‖F‖_w · ‖G‖_w)
 *
 * Values near 0 mean the two components are well separated.
 */

import { ssaGroup } from "./group";
import { resolveReconstructOptions, type ReconstructOptions } from "./options";
import { reconstructIndices } from "./reconstruct";
import type { GroupSpec, SsaDecomposition } from "./types";
import { ssaWeights } from "./types";

/** Singular values of the retained eigentriples, descending. */
export function ssaSingularValues(decomposition: SsaDecomposition): number[] {
  return decomposition.triples.map((t) => t.sigma);
}

/**
 * Share of the trajectory matrix energy carried by each retained
 * eigentriple: σᵢ² / ‖X‖²_F. Sums to 1 when nothing was truncated.
 */
export function ssaContributions(decomposition: SsaDecomposition): number[] {
  const { normSq, series, N, L } = decomposition;
  if (normSq === 0) return decomposition.triples.map(() => 0);
  if (Number.isFinite(normSq)) {
    return decomposition.triples.map((t) => (t.sigma * t.sigma) / normSq);
  }

  // ‖X‖²_F overflowed: work in units of max|x|.
  let scale = 0;
  for (let k = 0; k < N; k++) scale = Math.max(scale, Math.abs(series[k]));
  const w = ssaWeights(N, L);
  let scaledNormSq = 0;
  for (let k = 0; k < N; k++) scaledNormSq += w[k] * (series[k] / scale) ** 2;
  return decomposition.triples.map((t) => (t.sigma / scale) ** 2 / scaledNormSq);
}

/** Weighted inner product ⟨a, b⟩_w. */
export function weightedInner(a: ArrayLike<number>, b: ArrayLike<number>, w: ArrayLike<number>): number {
  let s = 0;
  for (let k = 0; k < w.length; k++) s += w[k] * a[k] * b[k];
  return s;
}

/** Options for ssaWCorrelation: reconstruction options plus optional groups */
export interface WCorrelationOptions extends ReconstructOptions {
  /** Correlate these groups instead of the elementary components */
  groups?: GroupSpec;
}

/**
 * W-correlation matrix between reconstructed components.
 *
 * Without `groups` there is one component per retained eigentriple
 * (elementary reconstruction), ordered by index. With `groups` the rows
 * follow the group order. A component with zero weighted norm has
 * correlation 1 with itself and 0 with everything else.
 */
export async function ssaWCorrelation(
  decomposition: SsaDecomposition,
  options: WCorrelationOptions = {},
): Promise<number[][]> {
  const { groups, ...reconstructOptions } = options;
  const { dtype, signal, logger } = resolveReconstructOptions(reconstructOptions);

  const indexSets: (readonly number[])[] = groups === undefined
    ? decomposition.triples.map((t) => [t.index])
    : ssaGroup(decomposition, groups).groups.map((g) => g.indices);

  logger.debug(`w-correlation over ${indexSets.length} components`);

  const components: Float64Array[] = [];
  for (const indices of indexSets) {
    signal?.throwIfAborted();
    components.push(await reconstructIndices(decomposition, indices, dtype));
  }

  const w = ssaWeights(decomposition.N, decomposition.L);
  const norms = components.map((c) => Math.sqrt(weightedInner(c, c, w)));
  const m = components.length;
  const rho: number[][] = Array.from({ length: m }, () => new Array<number>(m).fill(0));
  for (let i = 0; i < m; i++) {
    rho[i][i] = 1;
    for (let j = i + 1; j < m; j++) {
      const denom = norms[i] * norms[j];
      const r = denom === 0 ? 0 : weightedInner(components[i], components[j], w) / denom;
      rho[i][j] = r;
      rho[j][i] = r;
    }
  }
  return rho;
}
