/**
 * Owns live evaluation jobs: starts them in the background, answers progress
 * and report queries, and hands terminal reports to the job store.
 */

import type {
  EvaluationReport,
  EvaluationStatistics,
  JobSummary,
  LanguageTag,
  ProgressSnapshot
} from "./types";
import type { BackendRegistry } from "./registry";
import type { CodeUnitSource } from "./sources";
import type { JobStore } from "./jobStore";
import { JobAlreadyFinishedError, JobNotFoundError } from "./errors";
import { EvaluationJob, isTerminal, runEvaluationJob, snapshotReport, summarizeReport } from "./coordinator";
import { errorMessage } from "./failures";
import { round2, type WeightTable } from "./scoreVector";

export type EvaluationServiceConfig = {
  registry: BackendRegistry;
  store: JobStore;
  weights: WeightTable;
  /** Used when a request does not name its backends. */
  defaultBackends: readonly string[];
  timeoutMs: number;
  maxConcurrentUnits: number;
  /** Finished reports the store rejected, kept in memory oldest-first up to this many. */
  maxUnstoredReports?: number;
};

const DEFAULT_MAX_UNSTORED_REPORTS = 100;

export type StartEvaluationInput = {
  source: CodeUnitSource;
  backends?: readonly string[];
};

type LiveJob = {
  job: EvaluationJob;
  done: Promise<EvaluationReport>;
  discarded: boolean;
};

export class EvaluationService {
  private readonly live = new Map<string, LiveJob>();
  private readonly unstored = new Set<string>();

  constructor(private readonly config: EvaluationServiceConfig) {}

  /**
   * Resolves backends up front (ConfigurationError on unknown ids), then runs
   * the job in the background and returns it while still pending or running.
   */
  startEvaluation(input: StartEvaluationInput): EvaluationJob {
    const ids = input.backends && input.backends.length > 0 ? input.backends : this.config.defaultBackends;
    const adapters = this.config.registry.resolve(ids);
    const job = new EvaluationJob(ids);
    const entry: LiveJob = { job, done: Promise.resolve(job.toReport()), discarded: false };

    entry.done = runEvaluationJob(job, input.source, {
      adapters,
      weights: this.config.weights,
      timeoutMs: this.config.timeoutMs,
      maxConcurrentUnits: this.config.maxConcurrentUnits
    })
      .catch((error: unknown) => {
        console.error(`[evaluation] job ${job.id} crashed:`, error);
        if (!isTerminal(job.status)) job.fail(`Evaluation aborted: ${errorMessage(error)}`);
        return job.toReport();
      })
      .then(async (report) => {
        if (entry.discarded) return report;
        try {
          await this.config.store.save(report);
          if (entry.discarded) {
            // Deleted while the save was in flight.
            await this.config.store.delete(job.id);
          } else {
            this.live.delete(job.id);
          }
        } catch (error) {
          // Stays served from memory; the job's outcome does not change.
          console.error(`[evaluation] failed to store report ${job.id}:`, error);
          if (!entry.discarded) this.retainUnstored(job.id);
        }
        return report;
      });

    this.live.set(job.id, entry);
    console.log(`[evaluation] started ${job.id} with ${ids.join(",")}`);
    return job;
  }

  /** Resolves with the terminal report of a job started by this service. */
  async waitFor(evaluationId: string): Promise<EvaluationReport> {
    const entry = this.live.get(evaluationId);
    if (entry) return entry.done;
    return this.getReport(evaluationId);
  }

  async getProgress(evaluationId: string): Promise<ProgressSnapshot> {
    const entry = this.live.get(evaluationId);
    if (entry) return entry.job.snapshot();
    return snapshotReport(await this.getStoredReport(evaluationId));
  }

  async getReport(evaluationId: string): Promise<EvaluationReport> {
    const entry = this.live.get(evaluationId);
    if (entry) return entry.job.toReport();
    return this.getStoredReport(evaluationId);
  }

  async cancel(evaluationId: string): Promise<ProgressSnapshot> {
    const entry = this.live.get(evaluationId);
    if (!entry) {
      const stored = await this.getStoredReport(evaluationId);
      throw new JobAlreadyFinishedError(evaluationId, stored.status);
    }
    if (!entry.job.requestCancel()) {
      throw new JobAlreadyFinishedError(evaluationId, entry.job.status);
    }
    console.log(`[evaluation] cancel requested for ${evaluationId}`);
    return entry.job.snapshot();
  }

  /** Live jobs first, then stored reports, newest first within each. */
  async listJobs(): Promise<JobSummary[]> {
    return (await this.allReports()).map(summarizeReport);
  }

  async getStatistics(): Promise<EvaluationStatistics> {
    const reports = await this.allReports();
    const completed = reports.filter((r) => r.status === "completed");
    const failed = reports.filter((r) => r.status === "failed");

    const languages: Partial<Record<LanguageTag, number>> = {};
    for (const report of reports) {
      for (const unit of report.units) {
        languages[unit.language] = (languages[unit.language] ?? 0) + 1;
      }
    }

    const durations: number[] = [];
    for (const { started_at, finished_at } of reports) {
      if (started_at && finished_at) durations.push((Date.parse(finished_at) - Date.parse(started_at)) / 1000);
    }
    const scored = completed.map((r) => r.overall_score ?? 0);

    return {
      total_evaluations: reports.length,
      completed_evaluations: completed.length,
      failed_evaluations: failed.length,
      average_score: scored.length === 0 ? 0 : round2(scored.reduce((a, b) => a + b, 0) / scored.length),
      languages_processed: languages,
      processing_time_avg_seconds:
        durations.length === 0 ? 0 : round2(durations.reduce((a, b) => a + b, 0) / durations.length)
    };
  }

  /** A running job is cancelled and its report is never stored. */
  async deleteJob(evaluationId: string): Promise<void> {
    const entry = this.live.get(evaluationId);
    if (entry) {
      entry.discarded = true;
      entry.job.requestCancel();
      this.live.delete(evaluationId);
      this.unstored.delete(evaluationId);
      await this.config.store.delete(evaluationId);
      console.log(`[evaluation] deleted ${evaluationId}`);
      return;
    }
    if (!(await this.config.store.delete(evaluationId))) {
      throw new JobNotFoundError(evaluationId);
    }
    console.log(`[evaluation] deleted ${evaluationId}`);
  }

  private retainUnstored(evaluationId: string): void {
    this.unstored.add(evaluationId);
    const limit = this.config.maxUnstoredReports ?? DEFAULT_MAX_UNSTORED_REPORTS;
    for (const oldest of this.unstored) {
      if (this.unstored.size <= limit) break;
      this.unstored.delete(oldest);
      this.live.delete(oldest);
      console.warn(`[evaluation] dropped unstored report ${oldest}`);
    }
  }

  private async getStoredReport(evaluationId: string): Promise<EvaluationReport> {
    const stored = await this.config.store.get(evaluationId);
    if (!stored) throw new JobNotFoundError(evaluationId);
    return stored;
  }

  private async allReports(): Promise<EvaluationReport[]> {
    const live = [...this.live.values()]
      .map((e) => e.job.toReport())
      .sort((a, b) => b.created_at.localeCompare(a.created_at));
    const liveIds = new Set(live.map((r) => r.evaluation_id));
    const stored = (await this.config.store.list()).filter((r) => !liveIds.has(r.evaluation_id));
    return [...live, ...stored];
  }
}
