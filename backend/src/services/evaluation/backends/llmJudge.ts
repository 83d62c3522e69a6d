/**
 * Remote chat-model judge over an OpenAI-compatible API (OpenAI, xAI Grok).
 * Guardrails: temperature 0, JSON-only answer validated with zod, no SDK retries.
 * Provider failures are classified into the failure taxonomy with a remediation hint.
 */

import OpenAI from "openai";
import { z } from "zod";
import type { BackendJudgment, CodeUnit, Deadline, FailureDescriptor, LanguageTag } from "../types";
import { BaseBackend } from "./base";
import { remainingMs } from "../deadline";
import { errorMessage, failure } from "../failures";
import { createScoreVector } from "../scoreVector";

const DEFAULT_CONFIDENCE = 0.5;
const MIN_CONFIDENCE = 0.05;
const MAX_CODE_CHARS = 12_000;

export type ChatCompletionRequest = {
  model: string;
  system: string;
  user: string;
  signal: AbortSignal;
  timeoutMs: number;
};

/** Returns the raw assistant message text. Tests inject a fake. */
export type ChatCompleteFn = (request: ChatCompletionRequest) => Promise<string>;

export type LlmJudgeOptions = {
  id: string;
  model: string;
  apiKey?: string;
  /** Environment variable named in the remediation hint when the key is missing. */
  apiKeyEnv: string;
  baseURL?: string;
  complete?: ChatCompleteFn;
};

export class MissingApiKeyError extends Error {
  constructor(public apiKeyEnv: string) {
    super(`${apiKeyEnv} is not configured`);
    this.name = "MissingApiKeyError";
  }
}

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

// --- Response parsing ---

const score = z.coerce.number().min(0).max(10);

export const JudgeResponseSchema = z.object({
  scores: z.object({
    correctness: score,
    efficiency: score,
    readability: score,
    scalability: score,
    security: score,
    modularity: score,
    documentation: score,
    best_practices: score,
    error_handling: score
  }),
  feedback: z.string().default(""),
  suggestions: z.array(z.string()).default([]),
  confidence: z.unknown().optional()
});

/** Strip code fences and surrounding prose, keeping the outermost JSON object. */
export function extractJsonObject(raw: string): string {
  const unfenced = raw.replace(/```(?:json)?/gi, "").trim();
  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");
  if (start === -1 || end < start) throw new MalformedResponseError("No JSON object in model response");
  return unfenced.slice(start, end + 1);
}

/** Numbers and numeric strings are clamped; anything else is the default. */
export function normalizeConfidence(value: unknown): number {
  const n = typeof value === "number" ? value : typeof value === "string" && value.trim() !== "" ? Number(value) : NaN;
  if (!Number.isFinite(n)) return DEFAULT_CONFIDENCE;
  return Math.min(1, Math.max(MIN_CONFIDENCE, n));
}

export function parseJudgeResponse(raw: string): BackendJudgment {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonObject(raw));
  } catch (e) {
    if (e instanceof MalformedResponseError) throw e;
    throw new MalformedResponseError(`Invalid JSON: ${errorMessage(e)}`);
  }
  const result = JudgeResponseSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new MalformedResponseError(`Response does not match the score schema: ${issues}`);
  }
  const data = result.data;
  return {
    scores: createScoreVector(data.scores),
    confidence: normalizeConfidence(data.confidence),
    feedback: data.feedback.trim() || "No feedback provided",
    suggestions: data.suggestions.map((s) => s.trim()).filter(Boolean)
  };
}

// --- Provider error classification ---

function statusOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return null;
}

function codeOf(error: unknown): string | null {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

export function classifyProviderError(error: unknown, backendId: string): FailureDescriptor {
  const message = errorMessage(error);
  if (error instanceof MalformedResponseError) {
    return failure("malformed_response", message);
  }
  if (error instanceof MissingApiKeyError) {
    return failure("auth_failure", message, `Set ${error.apiKeyEnv} to enable the ${backendId} backend.`);
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIUserAbortError) {
    return failure("timeout", message);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return failure(
      "internal",
      `Network error: ${message}`,
      `Could not reach the ${backendId} API. Check network access and the configured base URL.`
    );
  }
  const status = statusOf(error);
  if (status === 429) {
    const quota = codeOf(error) === "insufficient_quota";
    return failure(
      "rate_limited",
      message,
      quota
        ? `The ${backendId} account has no remaining quota. Add credits or switch keys, then re-run the evaluation.`
        : `The ${backendId} rate limit was hit. Lower MAX_CONCURRENT_UNITS or re-run later.`
    );
  }
  if (status === 401 || status === 403) {
    return failure("auth_failure", message, `The ${backendId} API rejected the credentials. Check or rotate the API key.`);
  }
  if (status !== null && status >= 500) {
    return failure("internal", message, `The ${backendId} API reported a server error (${status}). Re-run later.`);
  }
  return failure("internal", message);
}

// --- Prompt ---

const SYSTEM_PROMPT = `You are an expert code reviewer. Score the code on nine criteria from 0 to 10:
correctness, efficiency, readability, scalability, security, modularity, documentation, best_practices, error_handling.
Respond with ONLY a JSON object, no markdown:
{"scores": {"correctness": n, "efficiency": n, "readability": n, "scalability": n, "security": n, "modularity": n, "documentation": n, "best_practices": n, "error_handling": n},
 "feedback": "what the code does well and what needs improvement",
 "suggestions": ["specific, actionable suggestion"],
 "confidence": number between 0 and 1 for how sure you are}`;

export function buildJudgePrompt(unit: CodeUnit): { system: string; user: string } {
  const code = unit.content.length > MAX_CODE_CHARS ? `${unit.content.slice(0, MAX_CODE_CHARS)}\n...[truncated]` : unit.content;
  return { system: SYSTEM_PROMPT, user: `Language: ${unit.language}\nUnit: ${unit.identifier}\n\nCode:\n${code}` };
}

// --- Backend ---

export class LlmJudgeBackend extends BaseBackend {
  protected readonly id: string;
  protected readonly kind = "remote" as const;
  protected readonly languages: readonly LanguageTag[] = ["python", "sql", "pyspark"];
  private client: OpenAI | null = null;

  constructor(private readonly options: LlmJudgeOptions) {
    super();
    this.id = options.id;
  }

  protected async run(unit: CodeUnit, deadline: Deadline): Promise<BackendJudgment> {
    const { system, user } = buildJudgePrompt(unit);
    const complete: ChatCompleteFn = this.options.complete ?? ((request) => this.completeWithOpenAI(request));
    const raw = await complete({
      model: this.options.model,
      system,
      user,
      signal: deadline.signal,
      timeoutMs: remainingMs(deadline)
    });
    return parseJudgeResponse(raw);
  }

  protected classifyError(error: unknown): FailureDescriptor {
    return classifyProviderError(error, this.id);
  }

  private async completeWithOpenAI(request: ChatCompletionRequest): Promise<string> {
    if (!this.options.apiKey) throw new MissingApiKeyError(this.options.apiKeyEnv);
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseURL, maxRetries: 0 });
    }
    const completion = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user }
        ],
        temperature: 0,
        max_tokens: 1500
      },
      { signal: request.signal, timeout: Math.max(1, request.timeoutMs) }
    );
    return completion.choices[0]?.message?.content?.trim() ?? "";
  }
}
