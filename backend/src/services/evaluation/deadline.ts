/**
 * Absolute deadlines for backend invocations, backed by an AbortSignal.
 */

import type { Deadline } from "./types";

export type DeadlineHandle = {
  deadline: Deadline;
  /** Clears the timer; call once the invocation has settled. */
  dispose: () => void;
};

export function createDeadline(timeoutMs: number): DeadlineHandle {
  const at = Date.now() + timeoutMs;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), Math.max(0, timeoutMs));
  return {
    deadline: { at, signal: controller.signal },
    dispose: () => clearTimeout(timer)
  };
}

export function remainingMs(deadline: Deadline): number {
  return Math.max(0, deadline.at - Date.now());
}

export type DeadlineOutcome<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Settle with the work's value, or with timedOut once the deadline signal fires.
 * Rejections of the work propagate unless the deadline fired first.
 */
export function raceDeadline<T>(work: Promise<T>, deadline: Deadline): Promise<DeadlineOutcome<T>> {
  if (deadline.signal.aborted) return Promise.resolve({ timedOut: true });
  let onAbort: (() => void) | null = null;
  const expired = new Promise<DeadlineOutcome<T>>((resolve) => {
    onAbort = () => resolve({ timedOut: true });
    deadline.signal.addEventListener("abort", onAbort, { once: true });
  });
  const finished = work.then((value): DeadlineOutcome<T> => ({ timedOut: false, value }));
  return Promise.race([finished, expired]).finally(() => {
    if (onAbort) deadline.signal.removeEventListener("abort", onAbort);
  });
}
