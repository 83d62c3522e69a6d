/**
 * Program-level errors. Backend failures are data (see failures.ts), not exceptions.
 */

import type { JobStatus } from "./types";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class IllegalTransitionError extends Error {
  constructor(public from: JobStatus, public to: JobStatus) {
    super(`Illegal job transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export class JobNotFoundError extends Error {
  constructor(public evaluationId: string) {
    super(`Evaluation ${evaluationId} not found`);
    this.name = "JobNotFoundError";
  }
}

export class JobAlreadyFinishedError extends Error {
  constructor(public evaluationId: string, public status: JobStatus) {
    super(`Evaluation ${evaluationId} already ${status}`);
    this.name = "JobAlreadyFinishedError";
  }
}
