/**
 * Local SQL analyzer: pattern checks for security, correctness, efficiency
 * and style on one statement or script.
 */

import type { BackendJudgment, CodeUnit, LanguageTag } from "../types";
import { BaseBackend } from "./base";
import { createScoreVector, round2 } from "../scoreVector";

const INJECTION_PATTERNS = [
  /\bOR\s+['"]?1['"]?\s*=\s*['"]?1['"]?/i,
  /\bOR\s+['"]?true['"]?\s*=\s*['"]?true['"]?/i,
  /\bUNION\s+(ALL\s+)?SELECT\b/i,
  /';?\s*(DROP|DELETE|UPDATE|INSERT|ALTER|EXEC|EXECUTE)\b/i,
  /\b(xp_cmdshell|sp_executesql)\b/i
];

const STATEMENT_START =
  /^(SELECT|WITH|INSERT|UPDATE|DELETE|CREATE|ALTER|DROP|TRUNCATE|MERGE|GRANT|REVOKE|USE|SET|SHOW|DESCRIBE|EXPLAIN|CALL)\b/i;

export type SqlFindings = {
  injection: boolean;
  destructive: boolean;
  missingWhere: boolean;
  privilegeEscalation: boolean;
  selectStar: boolean;
  crossJoin: boolean;
  orderWithoutLimit: boolean;
  syntaxValid: boolean;
  mixedKeywordCase: boolean;
  singleLongLine: boolean;
  hasComments: boolean;
};

/** Strip comments and collapse whitespace. */
export function normalizeSql(code: string): string {
  return code
    .replace(/--.*$/gm, "")
    .replace(/\/\*[\s\S]*?\*\//g, "")
    .replace(/\s+/g, " ")
    .trim();
}

function parensBalanced(sql: string): boolean {
  let depth = 0;
  for (const ch of sql) {
    if (ch === "(") depth++;
    else if (ch === ")") depth--;
    if (depth < 0) return false;
  }
  return depth === 0;
}

export function scanSql(code: string): SqlFindings {
  const sql = normalizeSql(code);
  const missingWhere =
    (/\bDELETE\s+FROM\s+\S+/i.test(sql) || /\bUPDATE\s+\S+\s+SET\b/i.test(sql)) && !/\bWHERE\b/i.test(sql);
  const dropsOrTruncates = /\b(DROP\s+(TABLE|DATABASE|SCHEMA|VIEW|INDEX)|TRUNCATE\s+TABLE)\b/i.test(sql);
  return {
    injection: INJECTION_PATTERNS.some((p) => p.test(sql)),
    destructive: missingWhere || dropsOrTruncates,
    missingWhere,
    privilegeEscalation: /\bGRANT\b.+\bWITH\s+(ADMIN|GRANT)\s+OPTION\b/i.test(sql),
    selectStar: /\bSELECT\s+(DISTINCT\s+)?\*/i.test(sql),
    crossJoin: /\bCROSS\s+JOIN\b/i.test(sql),
    orderWithoutLimit: /\bORDER\s+BY\b/i.test(sql) && !/\b(LIMIT|TOP|FETCH\s+FIRST)\b/i.test(sql),
    syntaxValid: STATEMENT_START.test(sql) && parensBalanced(sql),
    mixedKeywordCase: /\b(SELECT|FROM|WHERE|JOIN)\b/.test(code) && /\b(select|from|where|join)\b/.test(code),
    singleLongLine: sql.split(" ").length > 10 && !code.trim().includes("\n"),
    hasComments: /--|\/\*/.test(code)
  };
}

function lowest(base: number, penalties: Array<[boolean, number]>): number {
  return penalties.reduce((acc, [hit, score]) => (hit ? Math.min(acc, score) : acc), base);
}

export function judgeSql(f: SqlFindings): BackendJudgment {
  const suggestions: string[] = [];
  const notes: string[] = [];

  if (f.injection) {
    notes.push("SQL injection pattern detected.");
    suggestions.push("Use parameterized queries instead of string concatenation.");
  }
  if (f.missingWhere) {
    notes.push("DELETE/UPDATE without WHERE affects every row.");
    suggestions.push("Add a WHERE clause to DELETE/UPDATE statements.");
  } else if (f.destructive) {
    notes.push("Destructive DDL statement.");
    suggestions.push("Guard DROP/TRUNCATE behind explicit migrations or IF EXISTS checks.");
  }
  if (f.privilegeEscalation) {
    notes.push("Grant with admin/grant option.");
    suggestions.push("Grant only the privileges needed, without ADMIN/GRANT OPTION.");
  }
  if (!f.syntaxValid) {
    notes.push("Statement is not recognisable SQL or has unbalanced parentheses.");
    suggestions.push("Fix SQL syntax errors.");
  }
  if (f.crossJoin) {
    notes.push("CROSS JOIN produces a cartesian product.");
    suggestions.push("Use an INNER JOIN with explicit join conditions.");
  }
  if (f.selectStar) {
    notes.push("SELECT * reads and exposes every column.");
    suggestions.push("Select only the columns you need.");
  }
  if (f.orderWithoutLimit) suggestions.push("Add LIMIT to ORDER BY queries on large tables.");
  if (f.mixedKeywordCase) suggestions.push("Use one case for SQL keywords.");
  if (f.singleLongLine) suggestions.push("Break long statements across lines.");

  const security = lowest(10, [
    [f.injection, 1],
    [f.destructive, 2],
    [f.privilegeEscalation, 3],
    [f.selectStar, 5]
  ]);
  const correctness = lowest(10, [
    [!f.syntaxValid, 2],
    [f.missingWhere, 4]
  ]);
  const efficiency = lowest(10, [
    [f.crossJoin, 3],
    [f.selectStar, 6],
    [f.orderWithoutLimit, 7]
  ]);
  const readability = Math.max(1, 10 - (f.mixedKeywordCase ? 2 : 0) - (f.singleLongLine ? 1 : 0));

  let confidence = 0.8;
  if (f.injection || f.destructive) confidence += 0.1;
  if (!f.syntaxValid) confidence += 0.1;
  if (f.crossJoin) confidence += 0.05;

  return {
    scores: createScoreVector({
      correctness,
      efficiency,
      readability,
      scalability: efficiency,
      security,
      modularity: 8,
      documentation: f.hasComments ? 8 : 6,
      best_practices: Math.max(1, readability - (f.selectStar ? 1 : 0)),
      error_handling: 8
    }),
    confidence: round2(Math.min(1, confidence)),
    feedback: notes.length === 0 ? "SQL analysis found no issues." : notes.join(" "),
    suggestions
  };
}

export class SqlAnalyzerBackend extends BaseBackend {
  protected readonly id = "sql";
  protected readonly kind = "local" as const;
  protected readonly languages: readonly LanguageTag[] = ["sql"];

  protected async run(unit: CodeUnit): Promise<BackendJudgment> {
    return judgeSql(scanSql(unit.content));
  }
}
