/**
 * Storage for terminal evaluation reports. In memory by default; Postgres
 * (evaluation_reports table) when DATABASE_URL is configured.
 */

import { z } from "zod";
import { LANGUAGE_TAGS, type EvaluationReport } from "./types";

export interface JobStore {
  save(report: EvaluationReport): Promise<void>;
  get(evaluationId: string): Promise<EvaluationReport | null>;
  /** Newest first. */
  list(): Promise<EvaluationReport[]>;
  delete(evaluationId: string): Promise<boolean>;
}

export class InMemoryJobStore implements JobStore {
  private readonly reports = new Map<string, EvaluationReport>();

  async save(report: EvaluationReport): Promise<void> {
    this.reports.set(report.evaluation_id, report);
  }

  async get(evaluationId: string): Promise<EvaluationReport | null> {
    return this.reports.get(evaluationId) ?? null;
  }

  async list(): Promise<EvaluationReport[]> {
    return [...this.reports.values()].sort((a, b) => b.created_at.localeCompare(a.created_at));
  }

  async delete(evaluationId: string): Promise<boolean> {
    return this.reports.delete(evaluationId);
  }
}

// --- Postgres ---

/** The slice of pg's Pool the store uses. */
export type SqlClient = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
};

const score = z.number().min(0).max(10);
const scoreVectorSchema = z.object({
  correctness: score,
  efficiency: score,
  readability: score,
  scalability: score,
  security: score,
  modularity: score,
  documentation: score,
  best_practices: score,
  error_handling: score
});
const languageSchema = z.enum(LANGUAGE_TAGS);
const statusSchema = z.enum(["pending", "running", "completed", "failed"]);

const backendResultSchema = z.object({
  backend_id: z.string(),
  scores: scoreVectorSchema,
  confidence: z.number(),
  feedback: z.string(),
  suggestions: z.array(z.string()),
  failure: z
    .object({
      kind: z.enum(["timeout", "rate_limited", "auth_failure", "malformed_response", "internal"]),
      message: z.string(),
      remediation: z.string()
    })
    .nullable(),
  duration_ms: z.number()
});

const unitEvaluationSchema = z.object({
  unit_id: z.string(),
  language: languageSchema,
  backend_results: z.array(backendResultSchema),
  scores: scoreVectorSchema,
  overall_score: z.number(),
  contributing_backends: z.array(z.string()),
  failed_backends: z.array(z.string()),
  no_contributing_backend: z.boolean(),
  suggestions: z.array(z.string())
});

export const EvaluationReportSchema = z.object({
  evaluation_id: z.string(),
  status: statusSchema,
  backends: z.array(z.string()),
  total_units: z.number().int(),
  units_completed: z.number().int(),
  units: z.array(unitEvaluationSchema),
  overall_score: z.number().nullable(),
  scores: scoreVectorSchema.nullable(),
  failure_reason: z.string().nullable(),
  created_at: z.string(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable()
});

const reportRowSchema = z.object({ report_json: EvaluationReportSchema });

function parseRow(row: unknown): EvaluationReport {
  return reportRowSchema.parse(row).report_json;
}

// evaluation_id is a UUID column; anything else would make the query itself fail.
const evaluationIdSchema = z.string().uuid();

function isEvaluationId(evaluationId: string): boolean {
  return evaluationIdSchema.safeParse(evaluationId).success;
}

export class PgJobStore implements JobStore {
  constructor(private readonly db: SqlClient) {}

  async save(report: EvaluationReport): Promise<void> {
    await this.db.query(
      `INSERT INTO evaluation_reports
         (evaluation_id, status, total_units, units_completed, overall_score, failure_reason, report_json, created_at, finished_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (evaluation_id) DO UPDATE SET
         status = EXCLUDED.status,
         units_completed = EXCLUDED.units_completed,
         overall_score = EXCLUDED.overall_score,
         failure_reason = EXCLUDED.failure_reason,
         report_json = EXCLUDED.report_json,
         finished_at = EXCLUDED.finished_at`,
      [
        report.evaluation_id,
        report.status,
        report.total_units,
        report.units_completed,
        report.overall_score,
        report.failure_reason,
        JSON.stringify(report),
        report.created_at,
        report.finished_at
      ]
    );
  }

  async get(evaluationId: string): Promise<EvaluationReport | null> {
    if (!isEvaluationId(evaluationId)) return null;
    const result = await this.db.query("SELECT report_json FROM evaluation_reports WHERE evaluation_id = $1", [
      evaluationId
    ]);
    const row = result.rows[0];
    return row === undefined ? null : parseRow(row);
  }

  async list(): Promise<EvaluationReport[]> {
    const result = await this.db.query("SELECT report_json FROM evaluation_reports ORDER BY created_at DESC");
    return result.rows.map(parseRow);
  }

  async delete(evaluationId: string): Promise<boolean> {
    if (!isEvaluationId(evaluationId)) return false;
    const result = await this.db.query("DELETE FROM evaluation_reports WHERE evaluation_id = $1", [evaluationId]);
    return (result.rowCount ?? 0) > 0;
  }
}
