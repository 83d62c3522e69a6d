/**
 * Code unit sources. Each source is restartable: load() re-derives the units
 * from its input every time. A load() that throws fails the job.
 */

import { z } from "zod";
import type { CodeUnit, LanguageTag } from "./types";

export type CodeUnitSource = {
  kind: "inline" | "notebook" | "sql" | "script";
  load(): Promise<CodeUnit[]>;
};

export class SourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SourceError";
  }
}

const SQL_START = /^\s*(SELECT|WITH|INSERT|UPDATE|DELETE|CREATE|ALTER|DROP|TRUNCATE|MERGE)\b/i;
const SPARK_USAGE = /\b(pyspark|SparkSession|SparkContext)\b|\bspark\.(sql|read|table|createDataFrame)\b/;
const SQL_MAGIC = /^\s*%%sql\b[^\n]*\n?/;

export function inlineSource(units: readonly CodeUnit[]): CodeUnitSource {
  return {
    kind: "inline",
    load: async () => units.map((u) => ({ ...u }))
  };
}

// --- Notebooks ---

const cellSchema = z.object({
  cell_type: z.string(),
  source: z.union([z.string(), z.array(z.string())]).default("")
});

const notebookSchema = z.object({
  cells: z.array(cellSchema),
  metadata: z
    .object({
      kernelspec: z.object({ language: z.string().optional() }).partial().optional(),
      language_info: z.object({ name: z.string().optional() }).partial().optional()
    })
    .partial()
    .optional()
});

function kernelLanguage(notebook: z.infer<typeof notebookSchema>): LanguageTag {
  const name = (notebook.metadata?.kernelspec?.language ?? notebook.metadata?.language_info?.name ?? "python").toLowerCase();
  if (name === "python" || name === "python3") return "python";
  if (name === "sql") return "sql";
  return "unknown";
}

/** Language of one cell; the kernel language is the fallback. */
export function detectCellLanguage(code: string, fallback: LanguageTag): LanguageTag {
  if (SQL_MAGIC.test(code)) return "sql";
  if (SPARK_USAGE.test(code)) return "pyspark";
  if (SQL_START.test(code)) return "sql";
  return fallback;
}

export function parseNotebook(notebookJson: string, filename: string): CodeUnit[] {
  let raw: unknown;
  try {
    raw = JSON.parse(notebookJson);
  } catch (e) {
    throw new SourceError(`${filename} is not valid notebook JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = notebookSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SourceError(`${filename} is not a notebook: ${parsed.error.issues.map((i) => i.message).join(", ")}`);
  }
  const notebook = parsed.data;
  const fallback = kernelLanguage(notebook);
  const units: CodeUnit[] = [];
  notebook.cells.forEach((cell, index) => {
    if (cell.cell_type !== "code") return;
    const code = Array.isArray(cell.source) ? cell.source.join("") : cell.source;
    if (code.trim() === "") return;
    const language = detectCellLanguage(code, fallback);
    units.push({
      identifier: `${filename}#cell_${index}`,
      language,
      content: language === "sql" ? code.replace(SQL_MAGIC, "").trim() : code
    });
  });
  return units;
}

export function notebookSource(notebookJson: string, filename: string): CodeUnitSource {
  return {
    kind: "notebook",
    load: async () => parseNotebook(notebookJson, filename)
  };
}

// --- SQL scripts ---

/** Split on semicolons outside string literals and comments; comment-only pieces are dropped. */
export function splitSqlStatements(text: string): string[] {
  const statements: string[] = [];
  let current = "";
  let hasCode = false;
  let i = 0;
  const flush = () => {
    if (hasCode) statements.push(current.trim());
    current = "";
    hasCode = false;
  };
  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];
    if (ch === "-" && next === "-") {
      const end = text.indexOf("\n", i);
      const stop = end === -1 ? text.length : end;
      current += text.slice(i, stop);
      i = stop;
      continue;
    }
    if (ch === "/" && next === "*") {
      const end = text.indexOf("*/", i + 2);
      const stop = end === -1 ? text.length : end + 2;
      current += text.slice(i, stop);
      i = stop;
      continue;
    }
    if (ch === "'" || ch === '"') {
      let j = i + 1;
      while (j < text.length) {
        if (text[j] === ch && text[j + 1] === ch) j += 2;
        else if (text[j] === ch) break;
        else j++;
      }
      current += text.slice(i, j + 1);
      hasCode = true;
      i = j + 1;
      continue;
    }
    if (ch === ";") {
      flush();
      i++;
      continue;
    }
    current += ch;
    if (ch.trim() !== "") hasCode = true;
    i++;
  }
  flush();
  return statements;
}

export function sqlScriptSource(text: string, filename: string): CodeUnitSource {
  return {
    kind: "sql",
    load: async () =>
      splitSqlStatements(text).map((content, index) => ({
        identifier: `${filename}#stmt_${index}`,
        language: "sql",
        content
      }))
  };
}

// --- Whole files ---

export function languageFromFilename(filename: string, content: string): LanguageTag {
  const lower = filename.toLowerCase();
  if (lower.endsWith(".sql")) return "sql";
  if (lower.endsWith(".py")) return SPARK_USAGE.test(content) ? "pyspark" : "python";
  return "unknown";
}

export function scriptSource(text: string, filename: string, language?: LanguageTag): CodeUnitSource {
  return {
    kind: "script",
    load: async () => {
      if (text.trim() === "") throw new SourceError(`${filename} is empty`);
      return [{ identifier: filename, language: language ?? languageFromFilename(filename, text), content: text }];
    }
  };
}
