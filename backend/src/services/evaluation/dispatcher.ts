/**
 * Fans one code unit out to every supporting backend concurrently.
 * Each invocation gets its own absolute deadline fixed at dispatch time.
 */

import type { BackendResult, CodeUnit } from "./types";
import type { BackendAdapter } from "./backends/types";
import { createDeadline, raceDeadline } from "./deadline";
import { errorMessage, failedResult, failure } from "./failures";

export type DispatchOptions = {
  timeoutMs: number;
};

/** How long past its deadline an adapter may take to report its own timeout. */
export const CONTRACT_GRACE_MS = 100;

async function invoke(adapter: BackendAdapter, unit: CodeUnit, timeoutMs: number): Promise<BackendResult> {
  const id = adapter.identifier();
  const started = Date.now();
  const { deadline, dispose } = createDeadline(timeoutMs);
  const guard = createDeadline(timeoutMs + CONTRACT_GRACE_MS);
  try {
    const outcome = await raceDeadline(adapter.evaluate(unit, deadline), guard.deadline);
    if (outcome.timedOut) {
      console.warn(`[dispatcher] ${id} ignored its deadline on ${unit.identifier}`);
      return failedResult(id, failure("timeout", `No response within ${timeoutMs}ms`), Date.now() - started);
    }
    return outcome.value;
  } catch (error) {
    console.error(`[dispatcher] ${id} rejected on ${unit.identifier}:`, error);
    return failedResult(id, failure("internal", errorMessage(error)), Date.now() - started);
  } finally {
    dispose();
    guard.dispose();
  }
}

/**
 * Results come back in the order the adapters were given; adapters that do
 * not support the unit's language produce no entry.
 */
export async function dispatchUnit(
  unit: CodeUnit,
  adapters: readonly BackendAdapter[],
  options: DispatchOptions
): Promise<BackendResult[]> {
  const supporting = adapters.filter((a) => a.supports(unit.language));
  return Promise.all(supporting.map((adapter) => invoke(adapter, unit, options.timeoutMs)));
}
