import request from "supertest";
import { beforeEach, describe, expect, test, vi } from "vitest";
import { createApp } from "../src/app";
import { EvaluationService } from "../src/services/evaluation/evaluationService";
import { InMemoryJobStore, PgJobStore, type SqlClient } from "../src/services/evaluation/jobStore";
import { BackendRegistry } from "../src/services/evaluation/registry";
import { SqlAnalyzerBackend } from "../src/services/evaluation/backends/sqlAnalyzer";
import { StaticAnalyzerBackend } from "../src/services/evaluation/backends/staticAnalyzer";
import { DEFAULT_WEIGHTS } from "../src/services/evaluation/weights";

let service: EvaluationService;
let app: ReturnType<typeof createApp>;

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  const registry = new BackendRegistry().register(new StaticAnalyzerBackend()).register(new SqlAnalyzerBackend());
  const defaultBackends = ["static", "sql"];
  service = new EvaluationService({
    registry,
    store: new InMemoryJobStore(),
    weights: DEFAULT_WEIGHTS,
    defaultBackends,
    timeoutMs: 1_000,
    maxConcurrentUnits: 2
  });
  app = createApp({ service, registry, defaultBackends });
});

async function submit(body: Record<string, unknown>): Promise<string> {
  const res = await request(app).post("/api/evaluations").send(body);
  expect(res.status).toBe(202);
  await service.waitFor(res.body.evaluation_id);
  return res.body.evaluation_id;
}

describe("evaluations API", () => {
  test("GET /health", async () => {
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  test("GET /api/backends lists registered backends", async () => {
    const res = await request(app).get("/api/backends");
    expect(res.status).toBe(200);
    expect(res.body.backends.map((b: { id: string }) => b.id)).toEqual(["static", "sql"]);
    expect(res.body.default_backends).toEqual(["static", "sql"]);
  });

  test("submit, poll and read the report", async () => {
    const res = await request(app)
      .post("/api/evaluations")
      .send({
        units: [
          { identifier: "clean.py", language: "python", content: "def f():\n    return 1" },
          { identifier: "q.sql", language: "sql", content: "SELECT id FROM users WHERE id = 1" }
        ]
      });
    expect(res.status).toBe(202);
    expect(res.body.status).toBe("running");
    const id: string = res.body.evaluation_id;
    await service.waitFor(id);

    const progress = await request(app).get(`/api/evaluations/${id}/progress`);
    expect(progress.body).toEqual({ evaluation_id: id, units_completed: 2, total_units: 2, status: "completed" });

    const report = await request(app).get(`/api/evaluations/${id}`);
    expect(report.status).toBe(200);
    expect(report.body.status).toBe("completed");
    expect(report.body.units.map((u: { unit_id: string }) => u.unit_id)).toEqual(["clean.py", "q.sql"]);
    expect(report.body.units[0].contributing_backends).toEqual(["static"]);
    expect(report.body.units[1].contributing_backends).toEqual(["sql"]);
  });

  test("SQL scripts are split into statements", async () => {
    const id = await submit({ sql: "SELECT 1;\nDELETE FROM orders;", filename: "nightly.sql", backends: ["sql"] });
    const report = await request(app).get(`/api/evaluations/${id}`);
    expect(report.body.units.map((u: { unit_id: string }) => u.unit_id)).toEqual([
      "nightly.sql#stmt_0",
      "nightly.sql#stmt_1"
    ]);
    expect(report.body.units[1].scores.security).toBeCloseTo(2, 10);
  });

  test("notebooks can be sent as JSON", async () => {
    const id = await submit({
      notebook: { cells: [{ cell_type: "code", source: "print('hi')" }], metadata: {} },
      filename: "demo.ipynb"
    });
    const report = await request(app).get(`/api/evaluations/${id}`);
    expect(report.body.units[0].unit_id).toBe("demo.ipynb#cell_0");
    expect(report.body.units[0].language).toBe("python");
  });

  test("scripts are one unit, with the language from the filename or the request", async () => {
    const id = await submit({ script: "import os\nprint(os.getcwd())", filename: "tools/run.py" });
    const report = await request(app).get(`/api/evaluations/${id}`);
    expect(report.body.units).toHaveLength(1);
    expect(report.body.units[0].unit_id).toBe("tools/run.py");
    expect(report.body.units[0].language).toBe("python");
    expect(report.body.units[0].contributing_backends).toEqual(["static"]);

    const forced = await submit({ script: "SELECT id FROM users WHERE id = 1", filename: "query.txt", language: "sql" });
    const forcedReport = await request(app).get(`/api/evaluations/${forced}`);
    expect(forcedReport.body.units[0].language).toBe("sql");
    expect(forcedReport.body.units[0].contributing_backends).toEqual(["sql"]);
  });

  test("a script needs a filename", async () => {
    const res = await request(app).post("/api/evaluations").send({ script: "x = 1" });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "filename: filename is required with script" });
  });

  test("a broken notebook fails the job, not the request", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const id = await submit({ notebook: "not json" });
    const report = await request(app).get(`/api/evaluations/${id}`);
    expect(report.body.status).toBe("failed");
    expect(report.body.failure_reason).toMatch(/^Could not load code units: notebook\.ipynb is not valid notebook JSON/);
  });

  test("exactly one input is required", async () => {
    const res = await request(app)
      .post("/api/evaluations")
      .send({ sql: "SELECT 1", units: [{ identifier: "a", language: "python", content: "x = 1" }] });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Provide exactly one of units, notebook, sql or script" });
  });

  test("invalid unit language is a 400", async () => {
    const res = await request(app)
      .post("/api/evaluations")
      .send({ units: [{ identifier: "a", language: "cobol", content: "x" }] });
    expect(res.status).toBe(400);
    expect(res.body.error).toMatch(/^units\.0\.language: /);
  });

  test("unknown backend is a 400", async () => {
    const res = await request(app).post("/api/evaluations").send({ sql: "SELECT 1", backends: ["ghost"] });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Unknown backend ghost. Registered: static, sql" });
  });

  test("unknown evaluation is a 404", async () => {
    const res = await request(app).get("/api/evaluations/nope");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Evaluation nope not found" });
  });

  test("ids that are not UUIDs are a 404 with the Postgres store", async () => {
    const db: SqlClient = {
      query: async (_text, values) => {
        if (values?.some((v) => v === "not-a-uuid")) throw new Error('invalid input syntax for type uuid: "not-a-uuid"');
        return { rows: [], rowCount: 0 };
      }
    };
    const registry = new BackendRegistry().register(new SqlAnalyzerBackend());
    const pgService = new EvaluationService({
      registry,
      store: new PgJobStore(db),
      weights: DEFAULT_WEIGHTS,
      defaultBackends: ["sql"],
      timeoutMs: 1_000,
      maxConcurrentUnits: 1
    });
    const pgApp = createApp({ service: pgService, registry, defaultBackends: ["sql"] });

    const read = await request(pgApp).get("/api/evaluations/not-a-uuid");
    expect(read.status).toBe(404);
    expect(read.body).toEqual({ error: "Evaluation not-a-uuid not found" });
    expect((await request(pgApp).delete("/api/evaluations/not-a-uuid")).status).toBe(404);
    expect((await request(pgApp).post("/api/evaluations/not-a-uuid/cancel")).status).toBe(404);
  });

  test("cancelling a finished evaluation is a 409", async () => {
    const id = await submit({ sql: "SELECT 1" });
    const res = await request(app).post(`/api/evaluations/${id}/cancel`);
    expect(res.status).toBe(409);
    expect(res.body).toEqual({ error: `Evaluation ${id} already completed` });
  });

  test("list, stats and delete", async () => {
    const id = await submit({ sql: "SELECT 1" });

    const list = await request(app).get("/api/evaluations");
    expect(list.body.evaluations.map((e: { evaluation_id: string }) => e.evaluation_id)).toEqual([id]);

    const stats = await request(app).get("/api/evaluations/stats");
    expect(stats.body).toMatchObject({ total_evaluations: 1, completed_evaluations: 1, languages_processed: { sql: 1 } });

    expect((await request(app).delete(`/api/evaluations/${id}`)).status).toBe(204);
    expect((await request(app).get(`/api/evaluations/${id}`)).status).toBe(404);
  });

  test("unknown routes are 404", async () => {
    const res = await request(app).get("/api/nothing");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Route not found" });
  });
});
