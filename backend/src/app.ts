import express from "express";
import { createBackendsRouter } from "./routes/backends";
import { createEvaluationsRouter } from "./routes/evaluations";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler";
import type { EvaluationService } from "./services/evaluation/evaluationService";
import type { BackendRegistry } from "./services/evaluation/registry";

export type AppDeps = {
  service: EvaluationService;
  registry: BackendRegistry;
  defaultBackends: readonly string[];
  /** Comma-separated list; defaults to the local frontend. */
  frontendOrigin?: string;
};

export function createApp(deps: AppDeps) {
  const allowedOrigins = (deps.frontendOrigin ?? "http://localhost:3000")
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);

  const app = express();
  app.use(express.json({ limit: "5mb" }));

  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (origin && allowedOrigins.includes(origin)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
    }
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/api/backends", createBackendsRouter(deps.registry, deps.defaultBackends));
  app.use("/api/evaluations", createEvaluationsRouter(deps.service));
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
