import { describe, expect, test, vi } from "vitest";
import { CANCELLED_REASON, EvaluationJob, runEvaluationJob } from "../src/services/evaluation/coordinator";
import { IllegalTransitionError } from "../src/services/evaluation/errors";
import { mapCriteria, uniformScoreVector, zeroScoreVector } from "../src/services/evaluation/scoreVector";
import { inlineSource, type CodeUnitSource } from "../src/services/evaluation/sources";
import type { ProgressSnapshot } from "../src/services/evaluation/types";
import { DEFAULT_WEIGHTS } from "../src/services/evaluation/weights";
import { delay, hang, judgment, ScriptedBackend, unit } from "./helpers";

const base = { weights: DEFAULT_WEIGHTS, timeoutMs: 1_000, maxConcurrentUnits: 4 };

function quiet(): void {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
}

describe("runEvaluationJob", () => {
  test("keeps submission order when units finish in reverse", async () => {
    quiet();
    const latency: Record<string, number> = { A: 60, B: 30, C: 5 };
    const finished: string[] = [];
    const backend = new ScriptedBackend("timed", async (u) => {
      const j = await delay(latency[u.identifier], judgment(6, 1));
      finished.push(u.identifier);
      return j;
    });
    const job = new EvaluationJob(["timed"]);
    const report = await runEvaluationJob(job, inlineSource([unit("A"), unit("B"), unit("C")]), {
      ...base,
      adapters: [backend],
      maxConcurrentUnits: 3
    });

    expect(finished).toEqual(["C", "B", "A"]);
    expect(report.status).toBe("completed");
    expect(report.units.map((u) => u.unit_id)).toEqual(["A", "B", "C"]);
    expect(report.units_completed).toBe(3);
  });

  test("backend failures are absorbed: timeout, internal and a perfect score", async () => {
    quiet();
    const adapters = [
      new ScriptedBackend("slow", () => hang()),
      new ScriptedBackend("broken", async () => {
        throw new Error("analyzer crashed");
      }),
      new ScriptedBackend("perfect", async () => judgment(10, 1))
    ];
    const job = new EvaluationJob(["slow", "broken", "perfect"]);
    const report = await runEvaluationJob(job, inlineSource([unit("u1")]), { ...base, adapters, timeoutMs: 30 });

    expect(report.status).toBe("completed");
    const [evaluation] = report.units;
    expect(evaluation.scores).toEqual(uniformScoreVector(10));
    expect(evaluation.overall_score).toBe(10);
    expect(evaluation.no_contributing_backend).toBe(false);
    expect(evaluation.backend_results.map((r) => r.failure?.kind ?? null)).toEqual(["timeout", "internal", null]);
    expect(evaluation.failed_backends).toEqual(["slow", "broken"]);
    expect(evaluation.contributing_backends).toEqual(["perfect"]);
    expect(report.overall_score).toBe(10);
  });

  test("a unit no backend supports is still reported", async () => {
    quiet();
    const job = new EvaluationJob(["py"]);
    const report = await runEvaluationJob(job, inlineSource([unit("notes.txt", "unknown", "hello")]), {
      ...base,
      adapters: [new ScriptedBackend("py", async () => judgment(9, 1), ["python"])]
    });

    expect(report.status).toBe("completed");
    expect(report.units[0].backend_results).toEqual([]);
    expect(report.units[0].scores).toEqual(zeroScoreVector());
    expect(report.units[0].no_contributing_backend).toBe(true);
    expect(report.overall_score).toBe(0);
  });

  test("job aggregate is the unweighted mean of unit scores", async () => {
    quiet();
    const backend = new ScriptedBackend("by-unit", async (u) => judgment(u.identifier === "hi" ? 9 : 3, 1));
    const report = await runEvaluationJob(new EvaluationJob(["by-unit"]), inlineSource([unit("hi"), unit("lo")]), {
      ...base,
      adapters: [backend]
    });

    expect(report.units.map((u) => u.overall_score)).toEqual([9, 3]);
    expect(report.overall_score).toBe(6);
    expect(report.scores?.security).toBeCloseTo(6, 10);
  });

  test("an empty job completes with score 0", async () => {
    quiet();
    const report = await runEvaluationJob(new EvaluationJob([]), inlineSource([]), { ...base, adapters: [] });
    expect(report.status).toBe("completed");
    expect(report.total_units).toBe(0);
    expect(report.overall_score).toBe(0);
    expect(report.scores).toEqual(zeroScoreVector());
  });

  test("cancellation stops new units and fails the job", async () => {
    quiet();
    const job = new EvaluationJob(["steady"]);
    const backend = new ScriptedBackend("steady", async (u) => {
      if (u.identifier === "u10") job.requestCancel();
      return delay(2, judgment(5, 1));
    });
    const units = Array.from({ length: 100 }, (_, i) => unit(`u${i}`));
    const report = await runEvaluationJob(job, inlineSource(units), { ...base, adapters: [backend] });

    expect(report.status).toBe("failed");
    expect(report.failure_reason).toBe(CANCELLED_REASON);
    expect(report.units_completed).toBeGreaterThanOrEqual(11);
    expect(report.units_completed).toBeLessThanOrEqual(10 + base.maxConcurrentUnits);
    expect(report.units).toHaveLength(report.units_completed);
    expect(backend.seen).not.toContain("u20");
  });

  test("a cancel that lands while the last units are in flight still fails the job", async () => {
    quiet();
    const job = new EvaluationJob(["steady"]);
    const backend = new ScriptedBackend("steady", async (u) => {
      if (u.identifier === "u1") job.requestCancel();
      return delay(5, judgment(5, 1));
    });
    const report = await runEvaluationJob(job, inlineSource([unit("u0"), unit("u1")]), {
      ...base,
      adapters: [backend],
      maxConcurrentUnits: 2
    });

    expect(backend.seen).toEqual(["u0", "u1"]);
    expect(report.units_completed).toBe(2);
    expect(report.status).toBe("failed");
    expect(report.failure_reason).toBe(CANCELLED_REASON);
    expect(report.overall_score).toBeNull();
  });

  test("an unreadable source fails the job", async () => {
    quiet();
    const broken: CodeUnitSource = {
      kind: "notebook",
      load: async () => {
        throw new Error("disk gone");
      }
    };
    const report = await runEvaluationJob(new EvaluationJob(["x"]), broken, { ...base, adapters: [] });
    expect(report.status).toBe("failed");
    expect(report.failure_reason).toBe("Could not load code units: disk gone");
    expect(report.total_units).toBe(0);
    expect(report.finished_at).not.toBeNull();
  });

  test("a weight table that does not sum to 1 fails the job before any unit runs", async () => {
    quiet();
    const backend = new ScriptedBackend("never", async () => judgment(5, 1));
    const report = await runEvaluationJob(new EvaluationJob(["never"]), inlineSource([unit("u1")]), {
      ...base,
      adapters: [backend],
      weights: mapCriteria(() => 0.1)
    });
    expect(report.status).toBe("failed");
    expect(report.failure_reason).toMatch(/must sum to 1\.0/);
    expect(backend.seen).toEqual([]);
  });

  test("progress only moves forward", async () => {
    quiet();
    const snapshots: ProgressSnapshot[] = [];
    const backend = new ScriptedBackend("jitter", async (u) => delay(Number(u.identifier.slice(1)) % 3, judgment(5, 1)));
    const job = new EvaluationJob(["jitter"]);
    await runEvaluationJob(job, inlineSource(Array.from({ length: 12 }, (_, i) => unit(`u${i}`))), {
      ...base,
      adapters: [backend],
      onUnitEvaluated: (j) => snapshots.push(j.snapshot())
    });

    const counts = snapshots.map((s) => s.units_completed);
    expect(counts).toEqual([...counts].sort((a, b) => a - b));
    expect(counts.at(-1)).toBe(12);
    expect(job.snapshot()).toEqual({ evaluation_id: job.id, units_completed: 12, total_units: 12, status: "completed" });
  });
});

describe("EvaluationJob state machine", () => {
  test("terminal states are final", () => {
    const job = new EvaluationJob([]);
    job.start();
    job.setTotal(0);
    job.fail("boom");
    expect(() => job.fail("again")).toThrow(IllegalTransitionError);
    expect(() => job.start()).toThrow("Illegal job transition failed -> running");
    expect(job.requestCancel()).toBe(false);
  });

  test("cannot complete before starting", () => {
    const job = new EvaluationJob([]);
    expect(() => job.complete()).toThrow("Illegal job transition pending -> completed");
    expect(job.status).toBe("pending");
  });

  test("each slot is written once", () => {
    const job = new EvaluationJob([]);
    job.start();
    job.setTotal(1);
    const evaluation = {
      unit_id: "u0",
      language: "python" as const,
      backend_results: [],
      scores: zeroScoreVector(),
      overall_score: 0,
      contributing_backends: [],
      failed_backends: [],
      no_contributing_backend: true,
      suggestions: []
    };
    job.recordUnit(0, evaluation);
    expect(() => job.recordUnit(0, evaluation)).toThrow("Unit slot 0 already written");
    expect(() => job.recordUnit(1, evaluation)).toThrow(RangeError);
    expect(job.snapshot().units_completed).toBe(1);
  });

  test("a fresh job reports pending with no timestamps", () => {
    const job = new EvaluationJob(["static"], "job-1");
    expect(job.toReport()).toMatchObject({
      evaluation_id: "job-1",
      status: "pending",
      backends: ["static"],
      units: [],
      overall_score: null,
      started_at: null,
      finished_at: null
    });
  });
});
