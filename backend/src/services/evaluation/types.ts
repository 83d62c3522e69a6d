/**
 * Core evaluation types: score vectors, backend results, unit and job outcomes.
 * Wire shapes live in packages/shared so API consumers see the same types.
 */

import type {
  BackendResult,
  Criterion,
  LanguageTag,
  ScoreVector
} from "../../../../packages/shared/src/types";

export type {
  BackendDescriptor,
  BackendResult,
  CodeUnit,
  Criterion,
  EvaluationReport,
  EvaluationStatistics,
  FailureDescriptor,
  FailureKind,
  JobStatus,
  JobSummary,
  LanguageTag,
  ProgressSnapshot,
  ScoreVector,
  UnitEvaluation
} from "../../../../packages/shared/src/types";

export const CRITERIA: readonly Criterion[] = [
  "correctness",
  "efficiency",
  "readability",
  "scalability",
  "security",
  "modularity",
  "documentation",
  "best_practices",
  "error_handling"
] as const;

export const LANGUAGE_TAGS = ["python", "sql", "pyspark", "unknown"] as const satisfies readonly LanguageTag[];

export const SCORE_MIN = 0;
export const SCORE_MAX = 10;

/** Absolute deadline for one backend invocation; signal aborts when it passes. */
export type Deadline = {
  at: number;
  signal: AbortSignal;
};

/** What a backend variant produces before the adapter boundary stamps it. */
export type BackendJudgment = {
  scores: ScoreVector;
  confidence: number;
  feedback: string;
  suggestions: string[];
};

export function isFailed(result: BackendResult): boolean {
  return result.failure !== null;
}
