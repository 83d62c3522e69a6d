/**
 * Base backend: owns the adapter boundary. Variants implement run(); this class
 * applies the deadline, validates the judgment and turns every fault into a
 * failed BackendResult.
 */

import type {
  BackendDescriptor,
  BackendJudgment,
  BackendResult,
  CodeUnit,
  Deadline,
  FailureDescriptor,
  LanguageTag,
  ScoreVector
} from "../types";
import type { BackendAdapter } from "./types";
import { raceDeadline } from "../deadline";
import { errorMessage, failedResult, failure } from "../failures";
import { createScoreVector } from "../scoreVector";

export abstract class BaseBackend implements BackendAdapter {
  protected abstract readonly id: string;
  protected abstract readonly kind: BackendDescriptor["kind"];
  protected abstract readonly languages: readonly LanguageTag[];

  identifier(): string {
    return this.id;
  }

  supports(language: LanguageTag): boolean {
    return this.languages.includes(language);
  }

  describe(): BackendDescriptor {
    return { id: this.id, kind: this.kind, languages: [...this.languages] };
  }

  async evaluate(unit: CodeUnit, deadline: Deadline): Promise<BackendResult> {
    const started = Date.now();
    const elapsed = () => Date.now() - started;
    try {
      const outcome = await raceDeadline(this.run(unit, deadline), deadline);
      if (outcome.timedOut) {
        return this.fail(unit, failure("timeout", `No response within the deadline`), elapsed());
      }
      return this.toResult(outcome.value, elapsed());
    } catch (error) {
      return this.fail(unit, this.classifyError(error), elapsed());
    }
  }

  /** Variant work. May throw; deadline.signal aborts when time is up. */
  protected abstract run(unit: CodeUnit, deadline: Deadline): Promise<BackendJudgment>;

  /** Map a thrown fault to the failure taxonomy. Remote variants override. */
  protected classifyError(error: unknown): FailureDescriptor {
    return failure("internal", errorMessage(error));
  }

  private toResult(judgment: BackendJudgment, durationMs: number): BackendResult {
    const confidence = judgment.confidence;
    if (!(confidence > 0 && confidence <= 1)) {
      return failedResult(
        this.id,
        failure("malformed_response", `Confidence must be in (0, 1], got ${String(confidence)}`),
        durationMs
      );
    }
    let scores: ScoreVector;
    try {
      scores = createScoreVector({ ...judgment.scores });
    } catch (error) {
      return failedResult(this.id, failure("malformed_response", errorMessage(error)), durationMs);
    }
    return {
      backend_id: this.id,
      scores,
      confidence,
      feedback: judgment.feedback,
      suggestions: [...judgment.suggestions],
      failure: null,
      duration_ms: durationMs
    };
  }

  private fail(unit: CodeUnit, descriptor: FailureDescriptor, durationMs: number): BackendResult {
    console.warn(`[backend:${this.id}] ${unit.identifier}: ${descriptor.kind} - ${descriptor.message}`);
    return failedResult(this.id, descriptor, durationMs);
  }
}
