import type { StoredEvaluation } from "./models/types.js";

/**
 * The `count` highest-scoring evaluations, best first. A missing total_score
 * counts as 0; equal scores keep their original order.
 */
export function selectTopTrials(entries: readonly StoredEvaluation[], count: number): StoredEvaluation[] {
  if (count <= 0) return [];
  return [...entries]
    .sort((a, b) => (b.evaluation.total_score ?? 0) - (a.evaluation.total_score ?? 0))
    .slice(0, count);
}
