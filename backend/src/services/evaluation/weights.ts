/**
 * Weight table for the overall score. Fixed per process; checked once at startup.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";
import { assertWeightsSumToOne, type WeightTable } from "./scoreVector";

export const DEFAULT_WEIGHTS: WeightTable = Object.freeze({
  correctness: 0.2,
  security: 0.2,
  efficiency: 0.15,
  readability: 0.1,
  scalability: 0.1,
  modularity: 0.1,
  documentation: 0.05,
  best_practices: 0.05,
  error_handling: 0.05
});

const weight = z.number().min(0).max(1);

const WeightTableSchema = z
  .object({
    correctness: weight,
    efficiency: weight,
    readability: weight,
    scalability: weight,
    security: weight,
    modularity: weight,
    documentation: weight,
    best_practices: weight,
    error_handling: weight
  })
  .strict();

/** Validate shape and the sum-to-one invariant; throws ConfigurationError. */
export function createWeightTable(raw: unknown): WeightTable {
  const parsed = WeightTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "weights"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid score weights: ${issues}`);
  }
  const table = Object.freeze(parsed.data);
  assertWeightsSumToOne(table);
  return table;
}

/** Parse the SCORE_WEIGHTS setting; defaults when unset. */
export function loadWeightTable(json: string | undefined): WeightTable {
  if (json == null || json.trim() === "") return createWeightTable(DEFAULT_WEIGHTS);
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    throw new ConfigurationError(`SCORE_WEIGHTS is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return createWeightTable(raw);
}
