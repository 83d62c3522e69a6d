import { Router } from "express";
import type { BackendRegistry } from "../services/evaluation/registry";

export function createBackendsRouter(registry: BackendRegistry, defaultBackends: readonly string[]): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ backends: registry.describe(), default_backends: defaultBackends });
  });

  return router;
}
