import { BaseBackend } from "../src/services/evaluation/backends/base";
import type { BackendAdapter } from "../src/services/evaluation/backends/types";
import { uniformScoreVector } from "../src/services/evaluation/scoreVector";
import type {
  BackendDescriptor,
  BackendJudgment,
  BackendResult,
  CodeUnit,
  Deadline,
  LanguageTag
} from "../src/services/evaluation/types";

export function unit(identifier: string, language: LanguageTag = "python", content = "x = 1"): CodeUnit {
  return { identifier, language, content };
}

export function judgment(value: number, confidence: number, suggestions: string[] = []): BackendJudgment {
  return { scores: uniformScoreVector(value), confidence, feedback: `scored ${value}`, suggestions };
}

export function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

/** Never settles; the adapter boundary has to give up on it. */
export function hang<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

type Behaviour = (unit: CodeUnit, deadline: Deadline) => Promise<BackendJudgment>;

/** Backend whose work is a test-supplied function; goes through the real adapter boundary. */
export class ScriptedBackend extends BaseBackend {
  protected readonly kind = "local" as const;
  readonly seen: string[] = [];

  constructor(
    protected readonly id: string,
    private readonly behaviour: Behaviour,
    protected readonly languages: readonly LanguageTag[] = ["python", "sql", "pyspark"]
  ) {
    super();
  }

  protected async run(unit: CodeUnit, deadline: Deadline): Promise<BackendJudgment> {
    this.seen.push(unit.identifier);
    return this.behaviour(unit, deadline);
  }
}

/** Adapter that skips the base class, for checking the dispatcher's own guards. */
export class RawAdapter implements BackendAdapter {
  constructor(
    private readonly id: string,
    private readonly evaluateImpl: (unit: CodeUnit, deadline: Deadline) => Promise<BackendResult>
  ) {}

  identifier(): string {
    return this.id;
  }

  supports(): boolean {
    return true;
  }

  evaluate(unit: CodeUnit, deadline: Deadline): Promise<BackendResult> {
    return this.evaluateImpl(unit, deadline);
  }

  describe(): BackendDescriptor {
    return { id: this.id, kind: "local", languages: ["python"] };
  }
}
