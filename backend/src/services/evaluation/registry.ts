/**
 * Backend registry: identifier -> adapter, built once at startup.
 * Jobs resolve their backend list here before they start.
 */

import type { BackendDescriptor } from "./types";
import type { BackendAdapter } from "./backends/types";
import { ConfigurationError } from "./errors";
import { LlmJudgeBackend, type ChatCompleteFn } from "./backends/llmJudge";
import { SqlAnalyzerBackend } from "./backends/sqlAnalyzer";
import { StaticAnalyzerBackend } from "./backends/staticAnalyzer";

export class BackendRegistry {
  private readonly adapters = new Map<string, BackendAdapter>();

  register(adapter: BackendAdapter): this {
    const id = adapter.identifier();
    if (this.adapters.has(id)) {
      throw new ConfigurationError(`Backend ${id} is already registered`);
    }
    this.adapters.set(id, adapter);
    return this;
  }

  has(id: string): boolean {
    return this.adapters.has(id);
  }

  /** Adapters in request order. Unknown or repeated ids fail before any work starts. */
  resolve(ids: readonly string[]): BackendAdapter[] {
    const seen = new Set<string>();
    return ids.map((id) => {
      if (seen.has(id)) throw new ConfigurationError(`Backend ${id} is listed more than once`);
      seen.add(id);
      const adapter = this.adapters.get(id);
      if (!adapter) {
        throw new ConfigurationError(`Unknown backend ${id}. Registered: ${[...this.adapters.keys()].join(", ")}`);
      }
      return adapter;
    });
  }

  describe(): BackendDescriptor[] {
    return [...this.adapters.values()].map((a) => a.describe());
  }
}

export type RegistryConfig = {
  OPENAI_API_KEY?: string;
  OPENAI_MODEL: string;
  XAI_API_KEY?: string;
  XAI_MODEL: string;
  XAI_BASE_URL: string;
};

/** static, sql, openai and grok. Remote judges without a key report auth_failure per call. */
export function createDefaultRegistry(config: RegistryConfig, complete?: ChatCompleteFn): BackendRegistry {
  return new BackendRegistry()
    .register(new StaticAnalyzerBackend())
    .register(new SqlAnalyzerBackend())
    .register(
      new LlmJudgeBackend({
        id: "openai",
        model: config.OPENAI_MODEL,
        apiKey: config.OPENAI_API_KEY,
        apiKeyEnv: "OPENAI_API_KEY",
        complete
      })
    )
    .register(
      new LlmJudgeBackend({
        id: "grok",
        model: config.XAI_MODEL,
        apiKey: config.XAI_API_KEY,
        apiKeyEnv: "XAI_API_KEY",
        baseURL: config.XAI_BASE_URL,
        complete
      })
    );
}
