/**
 * Backend failure taxonomy. Failures are carried inside a BackendResult and
 * never thrown past the adapter boundary.
 */

import type { BackendResult, FailureDescriptor, FailureKind } from "./types";
import { zeroScoreVector } from "./scoreVector";

const DEFAULT_REMEDIATION: Record<FailureKind, string> = {
  timeout: "The backend did not answer before its deadline. Raise BACKEND_TIMEOUT_MS or retry later.",
  rate_limited: "The provider quota or rate limit is exhausted. Retry in a later evaluation or raise the plan limits.",
  auth_failure: "Credentials were rejected or are missing. Check the API key configured for this backend.",
  malformed_response: "The backend answered with data that is not a valid score vector. Retry, or pick a different model.",
  internal: "The backend failed unexpectedly. Check the service logs for details."
};

export function failure(kind: FailureKind, message: string, remediation?: string): FailureDescriptor {
  return { kind, message, remediation: remediation ?? DEFAULT_REMEDIATION[kind] };
}

export function failedResult(backendId: string, descriptor: FailureDescriptor, durationMs: number): BackendResult {
  return {
    backend_id: backendId,
    scores: zeroScoreVector(),
    confidence: 0,
    feedback: `Evaluation failed: ${descriptor.message}`,
    suggestions: [],
    failure: descriptor,
    duration_ms: durationMs
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
