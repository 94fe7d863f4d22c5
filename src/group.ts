import { IndexOutOfRangeError, InvalidOptionsError } from "./errors";
import { formatIssues, groupSpecSchema } from "./options";
import type { GroupSpec, SsaDecomposition, SsaGroup, SsaGrouping } from "./types";

/**
 * Check a group specification against a decomposition.
 *
 * Every index must be an integer in [1, d], d = number of retained
 * eigentriples. Within a group, repeated indices collapse to their first
 * occurrence; groups may overlap. No residual group is added: list the
 * remaining indices yourself (see ssaResidualIndices).
 *
 * @param decomposition - Result of ssaDecompose / ssaFactorize
 * @param spec - Group name → 1-based eigentriple indices
 * @throws IndexOutOfRangeError naming the first offending group and index
 */
export function ssaGroup(decomposition: SsaDecomposition, spec: GroupSpec): SsaGrouping {
  const parsed = groupSpecSchema.safeParse(spec);
  if (!parsed.success) throw new InvalidOptionsError("group specification", formatIssues(parsed.error));

  const d = decomposition.triples.length;
  const groups: SsaGroup[] = Object.entries(parsed.data).map(([name, indices]) => {
    for (const idx of indices) {
      if (!Number.isInteger(idx) || idx < 1 || idx > d) throw new IndexOutOfRangeError(name, idx, d);
    }
    return Object.freeze({ name, indices: Object.freeze([...new Set(indices)]) });
  });

  return Object.freeze({ decomposition, groups: Object.freeze(groups) });
}

/**
 * Indices in [1, d] that no group of `spec` mentions, ascending.
 * Pass them as an explicit group to reconstruct the residual.
 */
export function ssaResidualIndices(decomposition: SsaDecomposition, spec: GroupSpec): number[] {
  const used = new Set<number>();
  for (const indices of Object.values(spec)) for (const i of indices) used.add(i);
  return decomposition.triples.map((t) => t.index).filter((i) => !used.has(i));
}
