import { isFailed, type BackendResult, type CodeUnit, type UnitEvaluation } from "./types";
import { confidenceWeightedAverage, round2, weightedSum, zeroScoreVector, type WeightTable } from "./scoreVector";

/** Pure: same unit, results and weights give the same evaluation. */
export function aggregateUnit(unit: CodeUnit, results: readonly BackendResult[], weights: WeightTable): UnitEvaluation {
  const contributing = results.filter((r) => r.confidence > 0);
  const failed = results.filter(isFailed);

  const suggestions: string[] = [];
  const seen = new Set<string>();
  for (const result of contributing) {
    for (const suggestion of result.suggestions) {
      const key = suggestion.trim().toLowerCase();
      if (key === "" || seen.has(key)) continue;
      seen.add(key);
      suggestions.push(suggestion.trim());
    }
  }

  const base = {
    unit_id: unit.identifier,
    language: unit.language,
    backend_results: [...results],
    contributing_backends: contributing.map((r) => r.backend_id),
    failed_backends: failed.map((r) => r.backend_id),
    suggestions
  };

  if (contributing.length === 0) {
    return { ...base, scores: zeroScoreVector(), overall_score: 0, no_contributing_backend: true };
  }

  const scores = confidenceWeightedAverage(
    contributing.map((r) => r.scores),
    contributing.map((r) => r.confidence)
  );
  return { ...base, scores, overall_score: round2(weightedSum(scores, weights)), no_contributing_backend: false };
}
