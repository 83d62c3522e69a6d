import type { BackendDescriptor, BackendResult, CodeUnit, Deadline, LanguageTag } from "../types";

/**
 * One evaluator backend. evaluate() never rejects and returns by the deadline;
 * faults come back as a BackendResult with a failure and confidence 0.
 */
export interface BackendAdapter {
  identifier(): string;
  supports(language: LanguageTag): boolean;
  evaluate(unit: CodeUnit, deadline: Deadline): Promise<BackendResult>;
  describe(): BackendDescriptor;
}
