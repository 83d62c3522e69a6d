/**
 * Shared types for evaluation reports and progress polling.
 * Used by the backend and by any presentation layer that consumes its API.
 */

export type Criterion =
  | "correctness"
  | "efficiency"
  | "readability"
  | "scalability"
  | "security"
  | "modularity"
  | "documentation"
  | "best_practices"
  | "error_handling";

/** Nine-criterion judgment, each field in [0, 10]. */
export type ScoreVector = Readonly<Record<Criterion, number>>;

export type LanguageTag = "python" | "sql" | "pyspark" | "unknown";

export interface CodeUnit {
  identifier: string;
  language: LanguageTag;
  content: string;
}

export type FailureKind =
  | "timeout"
  | "rate_limited"
  | "auth_failure"
  | "malformed_response"
  | "internal";

export interface FailureDescriptor {
  kind: FailureKind;
  message: string;
  /** Human-readable hint for the operator. */
  remediation: string;
}

/** confidence is 0 exactly when failure is set. */
export interface BackendResult {
  backend_id: string;
  scores: ScoreVector;
  confidence: number;
  feedback: string;
  suggestions: string[];
  failure: FailureDescriptor | null;
  duration_ms: number;
}

export interface UnitEvaluation {
  unit_id: string;
  language: LanguageTag;
  backend_results: BackendResult[];
  scores: ScoreVector;
  overall_score: number;
  contributing_backends: string[];
  failed_backends: string[];
  /** True when every backend failed or none supported the unit. */
  no_contributing_backend: boolean;
  suggestions: string[];
}

export type JobStatus = "pending" | "running" | "completed" | "failed";

export interface ProgressSnapshot {
  evaluation_id: string;
  units_completed: number;
  total_units: number;
  status: JobStatus;
}

export interface EvaluationReport {
  evaluation_id: string;
  status: JobStatus;
  backends: string[];
  total_units: number;
  units_completed: number;
  /** Submission order; a running job lists only finished slots. */
  units: UnitEvaluation[];
  overall_score: number | null;
  scores: ScoreVector | null;
  failure_reason: string | null;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
}

export interface JobSummary {
  evaluation_id: string;
  status: JobStatus;
  units_completed: number;
  total_units: number;
  overall_score: number | null;
  created_at: string;
  finished_at: string | null;
}

export interface EvaluationStatistics {
  total_evaluations: number;
  completed_evaluations: number;
  failed_evaluations: number;
  average_score: number;
  languages_processed: Partial<Record<LanguageTag, number>>;
  processing_time_avg_seconds: number;
}

export interface BackendDescriptor {
  id: string;
  kind: "local" | "remote";
  languages: LanguageTag[];
}
