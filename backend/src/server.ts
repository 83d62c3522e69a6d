import { env } from "./config/env";
import { createApp } from "./app";
import { assertDatabaseConnection, getPool } from "./db/pool";
import { EvaluationService } from "./services/evaluation/evaluationService";
import { InMemoryJobStore, PgJobStore, type JobStore } from "./services/evaluation/jobStore";
import { createDefaultRegistry } from "./services/evaluation/registry";
import { loadWeightTable } from "./services/evaluation/weights";

async function createStore(): Promise<JobStore> {
  const pool = getPool();
  if (!pool) {
    console.log("[server] DATABASE_URL not set; reports are kept in memory");
    return new InMemoryJobStore();
  }
  await assertDatabaseConnection(pool);
  return new PgJobStore(pool);
}

async function bootstrap() {
  // Configuration errors stop the process before it accepts work.
  const weights = loadWeightTable(env.SCORE_WEIGHTS);
  const registry = createDefaultRegistry(env);
  registry.resolve(env.EVAL_BACKENDS);

  const service = new EvaluationService({
    registry,
    store: await createStore(),
    weights,
    defaultBackends: env.EVAL_BACKENDS,
    timeoutMs: env.BACKEND_TIMEOUT_MS,
    maxConcurrentUnits: env.MAX_CONCURRENT_UNITS
  });

  const app = createApp({
    service,
    registry,
    defaultBackends: env.EVAL_BACKENDS,
    frontendOrigin: env.FRONTEND_ORIGIN
  });
  app.listen(env.PORT, () => {
    console.log(`Backend listening on http://localhost:${env.PORT}`);
  });
}

bootstrap().catch((error) => {
  console.error("Failed to start backend:", error);
  process.exit(1);
});
