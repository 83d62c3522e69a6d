/**
 * Local heuristic analyzer for Python and PySpark units.
 * Deterministic: same content, same judgment.
 */

import type { BackendJudgment, CodeUnit, Criterion, LanguageTag } from "../types";
import { BaseBackend } from "./base";
import { createScoreVector } from "../scoreVector";

const MAX_LINE_LENGTH = 100;
const STATIC_CONFIDENCE = 0.6;

export type PythonFindings = {
  nonEmptyLines: number;
  commentLines: number;
  hasDocstring: boolean;
  definitions: number;
  tryBlocks: number;
  bareExcept: boolean;
  longLines: number;
  mixedIndentation: boolean;
  hardcodedSecret: boolean;
  usesEval: boolean;
  wildcardImport: boolean;
  sqlStringBuilding: boolean;
  sparkCollect: boolean;
};

export function scanPython(code: string, language: LanguageTag): PythonFindings {
  const lines = code.split("\n");
  const nonEmpty = lines.filter((l) => l.trim() !== "");
  const indented = nonEmpty.filter((l) => /^\s/.test(l));
  return {
    nonEmptyLines: nonEmpty.length,
    commentLines: nonEmpty.filter((l) => l.trim().startsWith("#")).length,
    hasDocstring: /("""|''')/.test(code),
    definitions: (code.match(/^\s*(def|class)\s+\w+/gm) ?? []).length,
    tryBlocks: (code.match(/^\s*try\s*:/gm) ?? []).length,
    bareExcept: /^\s*except\s*:/m.test(code),
    longLines: lines.filter((l) => l.length > MAX_LINE_LENGTH).length,
    mixedIndentation: indented.some((l) => l.startsWith("\t")) && indented.some((l) => l.startsWith(" ")),
    hardcodedSecret: /\b(password|passwd|secret|api_key|token)\s*=\s*['"][^'"]+['"]/i.test(code),
    usesEval: /\b(eval|exec)\s*\(/.test(code),
    wildcardImport: /^\s*from\s+\S+\s+import\s+\*/m.test(code),
    sqlStringBuilding: /\b(execute|sql)\s*\(\s*(f["']|["'][^"']*["']\s*(\+|%))/i.test(code),
    sparkCollect: language === "pyspark" && /\.(collect|toPandas)\s*\(\s*\)/.test(code)
  };
}

function clampScore(n: number): number {
  return Math.min(10, Math.max(1, n));
}

export function judgePython(findings: PythonFindings): BackendJudgment {
  const f = findings;
  const issues: string[] = [];
  const suggestions: string[] = [];

  if (f.usesEval) {
    issues.push("eval/exec call");
    suggestions.push("Replace eval()/exec() with explicit parsing or dispatch.");
  }
  if (f.hardcodedSecret) {
    issues.push("hard-coded credential");
    suggestions.push("Load credentials from the environment or a secrets manager.");
  }
  if (f.sqlStringBuilding) {
    issues.push("SQL built from strings");
    suggestions.push("Use parameterized queries instead of formatting SQL strings.");
  }
  if (f.bareExcept) {
    issues.push("bare except");
    suggestions.push("Catch specific exception types instead of a bare except.");
  }
  if (f.wildcardImport) {
    issues.push("wildcard import");
    suggestions.push("Import the names you use instead of using import *.");
  }
  if (f.longLines > 0) {
    issues.push(`${f.longLines} line(s) over ${MAX_LINE_LENGTH} characters`);
    suggestions.push(`Wrap lines longer than ${MAX_LINE_LENGTH} characters.`);
  }
  if (f.mixedIndentation) {
    issues.push("mixed tabs and spaces");
    suggestions.push("Indent with spaces only.");
  }
  if (f.sparkCollect) {
    issues.push("collect()/toPandas() on a Spark DataFrame");
    suggestions.push("Avoid collect()/toPandas() on large DataFrames; aggregate or write out in Spark.");
  }

  const commentRatio = f.nonEmptyLines > 0 ? f.commentLines / f.nonEmptyLines : 0;
  const documented = f.hasDocstring || commentRatio >= 0.1;
  if (!documented) suggestions.push("Add comments or docstrings explaining intent.");
  if (f.definitions === 0 && f.nonEmptyLines > 15) suggestions.push("Split long top-level code into functions.");
  if (f.tryBlocks === 0) suggestions.push("Handle expected failures (I/O, parsing) with try/except.");

  const scores: Record<Criterion, number> = {
    correctness: clampScore(8 - (f.bareExcept ? 1 : 0) - (f.wildcardImport ? 1 : 0)),
    efficiency: clampScore(8 - (f.sparkCollect ? 3 : 0)),
    readability: clampScore(10 - Math.min(3, f.longLines) - (f.mixedIndentation ? 2 : 0)),
    scalability: clampScore(8 - (f.sparkCollect ? 3 : 0)),
    security: clampScore(10 - (f.hardcodedSecret ? 5 : 0) - (f.usesEval ? 4 : 0) - (f.sqlStringBuilding ? 3 : 0)),
    modularity: f.definitions > 0 ? 9 : f.nonEmptyLines > 15 ? 4 : 7,
    documentation: documented ? 9 : f.commentLines > 0 ? 6 : 4,
    best_practices: clampScore(
      10 - (f.wildcardImport ? 2 : 0) - (f.bareExcept ? 2 : 0) - (f.mixedIndentation ? 2 : 0) - (f.longLines > 0 ? 1 : 0)
    ),
    error_handling: f.tryBlocks > 0 ? (f.bareExcept ? 6 : 9) : 5
  };

  const feedback =
    issues.length === 0
      ? "Static analysis found no issues."
      : `Static analysis found ${issues.length} issue(s): ${issues.join(", ")}.`;

  return {
    scores: createScoreVector(scores),
    confidence: STATIC_CONFIDENCE,
    feedback,
    suggestions
  };
}

export class StaticAnalyzerBackend extends BaseBackend {
  protected readonly id = "static";
  protected readonly kind = "local" as const;
  protected readonly languages: readonly LanguageTag[] = ["python", "pyspark"];

  protected async run(unit: CodeUnit): Promise<BackendJudgment> {
    return judgePython(scanPython(unit.content, unit.language));
  }
}
