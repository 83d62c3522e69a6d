import { Router } from "express";
import { z } from "zod";
import { parseBody } from "../middlewares/validate";
import { LANGUAGE_TAGS } from "../services/evaluation/types";
import type { EvaluationService } from "../services/evaluation/evaluationService";
import {
  inlineSource,
  notebookSource,
  scriptSource,
  sqlScriptSource,
  type CodeUnitSource
} from "../services/evaluation/sources";

const unitSchema = z.object({
  identifier: z.string().min(1),
  language: z.enum(LANGUAGE_TAGS),
  content: z.string()
});

export const createEvaluationSchema = z
  .object({
    units: z.array(unitSchema).min(1).optional(),
    /** Notebook document, as parsed JSON or as its raw text. */
    notebook: z.union([z.string(), z.record(z.unknown())]).optional(),
    sql: z.string().min(1).optional(),
    /** One whole file; its language comes from `language` or the filename. */
    script: z.string().optional(),
    language: z.enum(LANGUAGE_TAGS).optional(),
    filename: z.string().min(1).max(255).optional(),
    backends: z.array(z.string().min(1)).min(1).optional()
  })
  .refine((b) => [b.units, b.notebook, b.sql, b.script].filter((v) => v !== undefined).length === 1, {
    message: "Provide exactly one of units, notebook, sql or script"
  })
  .refine((b) => b.script === undefined || b.filename !== undefined, {
    message: "filename is required with script",
    path: ["filename"]
  });

type CreateEvaluationBody = z.infer<typeof createEvaluationSchema>;

function sourceFor(body: CreateEvaluationBody): CodeUnitSource {
  if (body.notebook !== undefined) {
    const text = typeof body.notebook === "string" ? body.notebook : JSON.stringify(body.notebook);
    return notebookSource(text, body.filename ?? "notebook.ipynb");
  }
  if (body.script !== undefined) {
    return scriptSource(body.script, body.filename ?? "script", body.language);
  }
  if (body.sql !== undefined) {
    return sqlScriptSource(body.sql, body.filename ?? "script.sql");
  }
  return inlineSource(body.units ?? []);
}

export function createEvaluationsRouter(service: EvaluationService): Router {
  const router = Router();

  router.post("/", (req, res, next) => {
    try {
      const body = parseBody(createEvaluationSchema, req.body);
      const job = service.startEvaluation({ source: sourceFor(body), backends: body.backends });
      res.status(202).json({ evaluation_id: job.id, status: job.status });
    } catch (e) {
      next(e);
    }
  });

  router.get("/", async (_req, res, next) => {
    try {
      res.json({ evaluations: await service.listJobs() });
    } catch (e) {
      next(e);
    }
  });

  router.get("/stats", async (_req, res, next) => {
    try {
      res.json(await service.getStatistics());
    } catch (e) {
      next(e);
    }
  });

  router.get("/:evaluation_id/progress", async (req, res, next) => {
    try {
      res.json(await service.getProgress(req.params.evaluation_id));
    } catch (e) {
      next(e);
    }
  });

  router.get("/:evaluation_id", async (req, res, next) => {
    try {
      res.json(await service.getReport(req.params.evaluation_id));
    } catch (e) {
      next(e);
    }
  });

  router.post("/:evaluation_id/cancel", async (req, res, next) => {
    try {
      res.json(await service.cancel(req.params.evaluation_id));
    } catch (e) {
      next(e);
    }
  });

  router.delete("/:evaluation_id", async (req, res, next) => {
    try {
      await service.deleteJob(req.params.evaluation_id);
      res.status(204).end();
    } catch (e) {
      next(e);
    }
  });

  return router;
}
