/**
 * Evaluation job state machine and the worker pool that drives it.
 *
 * pending -> running -> completed | failed. Backend failures never fail a job;
 * only weight-table violations, an unreadable source or cancellation do.
 */

import crypto from "node:crypto";
import type {
  CodeUnit,
  EvaluationReport,
  JobStatus,
  JobSummary,
  ProgressSnapshot,
  ScoreVector,
  UnitEvaluation
} from "./types";
import type { BackendAdapter } from "./backends/types";
import type { CodeUnitSource } from "./sources";
import { IllegalTransitionError } from "./errors";
import { errorMessage } from "./failures";
import { aggregateUnit } from "./aggregator";
import { dispatchUnit } from "./dispatcher";
import { assertWeightsSumToOne, meanScoreVector, round2, type WeightTable } from "./scoreVector";

export const CANCELLED_REASON = "cancelled";

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ["running"],
  running: ["completed", "failed"],
  completed: [],
  failed: []
};

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function summarizeReport(report: EvaluationReport): JobSummary {
  return {
    evaluation_id: report.evaluation_id,
    status: report.status,
    units_completed: report.units_completed,
    total_units: report.total_units,
    overall_score: report.overall_score,
    created_at: report.created_at,
    finished_at: report.finished_at
  };
}

export function snapshotReport(report: EvaluationReport): ProgressSnapshot {
  return {
    evaluation_id: report.evaluation_id,
    units_completed: report.units_completed,
    total_units: report.total_units,
    status: report.status
  };
}

export class EvaluationJob {
  readonly id: string;
  readonly backends: readonly string[];
  readonly createdAt = new Date();
  private _status: JobStatus = "pending";
  private _cancelRequested = false;
  private totalUnits = 0;
  private unitsCompleted = 0;
  /** One slot per unit, indexed by submission order; each written once. */
  private slots: Array<UnitEvaluation | undefined> = [];
  private startedAt: Date | null = null;
  private finishedAt: Date | null = null;
  private failureReason: string | null = null;
  private overallScore: number | null = null;
  private scores: ScoreVector | null = null;

  constructor(backends: readonly string[], id: string = crypto.randomUUID()) {
    this.id = id;
    this.backends = [...backends];
  }

  get status(): JobStatus {
    return this._status;
  }

  get cancelRequested(): boolean {
    return this._cancelRequested;
  }

  private transition(to: JobStatus): void {
    if (!TRANSITIONS[this._status].includes(to)) {
      throw new IllegalTransitionError(this._status, to);
    }
    this._status = to;
  }

  start(): void {
    this.transition("running");
    this.startedAt = new Date();
  }

  setTotal(totalUnits: number): void {
    if (this._status !== "running") throw new IllegalTransitionError(this._status, "running");
    this.totalUnits = totalUnits;
    this.slots = new Array<UnitEvaluation | undefined>(totalUnits).fill(undefined);
  }

  recordUnit(index: number, evaluation: UnitEvaluation): void {
    if (this._status !== "running") throw new IllegalTransitionError(this._status, "running");
    if (index < 0 || index >= this.totalUnits) throw new RangeError(`Unit slot ${index} out of range`);
    if (this.slots[index] !== undefined) throw new Error(`Unit slot ${index} already written`);
    this.slots[index] = evaluation;
    this.unitsCompleted++;
  }

  complete(): void {
    const units = this.completedUnits();
    if (units.length !== this.totalUnits) {
      throw new Error(`Cannot complete job ${this.id}: ${units.length}/${this.totalUnits} units evaluated`);
    }
    this.transition("completed");
    this.overallScore =
      units.length === 0 ? 0 : round2(units.reduce((acc, u) => acc + u.overall_score, 0) / units.length);
    this.scores = meanScoreVector(units.map((u) => u.scores));
    this.finishedAt = new Date();
  }

  fail(reason: string): void {
    this.transition("failed");
    this.failureReason = reason;
    this.finishedAt = new Date();
  }

  /** Best effort: no new units start. Returns false once the job is terminal. */
  requestCancel(): boolean {
    if (isTerminal(this._status)) return false;
    this._cancelRequested = true;
    return true;
  }

  snapshot(): ProgressSnapshot {
    return {
      evaluation_id: this.id,
      units_completed: this.unitsCompleted,
      total_units: this.totalUnits,
      status: this._status
    };
  }

  completedUnits(): UnitEvaluation[] {
    return this.slots.filter((s): s is UnitEvaluation => s !== undefined);
  }

  toSummary(): JobSummary {
    return summarizeReport(this.toReport());
  }

  toReport(): EvaluationReport {
    return {
      evaluation_id: this.id,
      status: this._status,
      backends: [...this.backends],
      total_units: this.totalUnits,
      units_completed: this.unitsCompleted,
      units: this.completedUnits(),
      overall_score: this.overallScore,
      scores: this.scores,
      failure_reason: this.failureReason,
      created_at: this.createdAt.toISOString(),
      started_at: this.startedAt?.toISOString() ?? null,
      finished_at: this.finishedAt?.toISOString() ?? null
    };
  }
}

export type CoordinatorConfig = {
  adapters: readonly BackendAdapter[];
  weights: WeightTable;
  timeoutMs: number;
  maxConcurrentUnits: number;
  /** Called after each unit lands in its slot. */
  onUnitEvaluated?: (job: EvaluationJob, evaluation: UnitEvaluation) => void;
};

/** Drive a pending job to a terminal state. Source and backend faults end up in the report, not as rejections. */
export async function runEvaluationJob(
  job: EvaluationJob,
  source: CodeUnitSource,
  config: CoordinatorConfig
): Promise<EvaluationReport> {
  job.start();

  try {
    assertWeightsSumToOne(config.weights);
  } catch (error) {
    console.error(`[coordinator] ${job.id}: ${errorMessage(error)}`);
    job.fail(errorMessage(error));
    return job.toReport();
  }

  let units: CodeUnit[];
  try {
    units = await source.load();
  } catch (error) {
    console.error(`[coordinator] ${job.id}: could not load ${source.kind} source:`, error);
    job.fail(`Could not load code units: ${errorMessage(error)}`);
    return job.toReport();
  }
  job.setTotal(units.length);
  console.log(`[coordinator] ${job.id}: ${units.length} unit(s), backends ${job.backends.join(",") || "(none)"}`);

  let next = 0;
  const worker = async (): Promise<void> => {
    while (!job.cancelRequested) {
      const index = next++;
      if (index >= units.length) return;
      const unit = units[index];
      const results = await dispatchUnit(unit, config.adapters, { timeoutMs: config.timeoutMs });
      const evaluation = aggregateUnit(unit, results, config.weights);
      job.recordUnit(index, evaluation);
      config.onUnitEvaluated?.(job, evaluation);
    }
  };

  const workers = Math.max(1, Math.min(config.maxConcurrentUnits, units.length));
  try {
    await Promise.all(Array.from({ length: workers }, () => worker()));
  } catch (error) {
    console.error(`[coordinator] ${job.id}: evaluation aborted:`, error);
    job.fail(`Evaluation aborted: ${errorMessage(error)}`);
    return job.toReport();
  }

  // An acknowledged cancel always fails the job, even if the in-flight units were the last ones.
  if (job.cancelRequested) {
    console.log(`[coordinator] ${job.id}: cancelled after ${job.snapshot().units_completed}/${units.length} unit(s)`);
    job.fail(CANCELLED_REASON);
  } else {
    job.complete();
    console.log(`[coordinator] ${job.id}: completed, overall ${job.toReport().overall_score}`);
  }
  return job.toReport();
}
