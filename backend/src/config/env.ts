import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({
  path: path.resolve(process.cwd(), ".env")
});

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(4000),
  /** Reports are kept in memory when unset. */
  DATABASE_URL: z.string().min(1).optional(),
  /** Comma-separated origins for CORS (e.g. https://yourapp.vercel.app). */
  FRONTEND_ORIGIN: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  XAI_API_KEY: z.string().optional(),
  XAI_MODEL: z.string().default("grok-3-mini"),
  XAI_BASE_URL: z.string().url().default("https://api.x.ai/v1"),
  /** Backends used when a request does not choose its own. */
  EVAL_BACKENDS: z
    .string()
    .default("static,sql")
    .transform((v) =>
      v
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean)
    ),
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_CONCURRENT_UNITS: z.coerce.number().int().positive().default(4),
  /** JSON object mapping all nine criteria to weights that sum to 1. */
  SCORE_WEIGHTS: z.string().optional()
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issueText = parsed.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new Error(`Invalid environment variables: ${issueText}`);
}

export const env = parsed.data;
