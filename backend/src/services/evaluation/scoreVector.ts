/**
 * Score vector arithmetic. Vectors are frozen; every function returns a new one.
 */

import { ConfigurationError } from "./errors";
import { CRITERIA, SCORE_MAX, SCORE_MIN, type Criterion, type ScoreVector } from "./types";

export type WeightTable = Readonly<Record<Criterion, number>>;

export const WEIGHT_SUM_TOLERANCE = 1e-6;

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/** Build a full criterion record from a per-criterion function. */
export function mapCriteria(fn: (criterion: Criterion) => number): Record<Criterion, number> {
  return {
    correctness: fn("correctness"),
    efficiency: fn("efficiency"),
    readability: fn("readability"),
    scalability: fn("scalability"),
    security: fn("security"),
    modularity: fn("modularity"),
    documentation: fn("documentation"),
    best_practices: fn("best_practices"),
    error_handling: fn("error_handling")
  };
}

export function zeroScoreVector(): ScoreVector {
  return uniformScoreVector(0);
}

export function uniformScoreVector(value: number): ScoreVector {
  return createScoreVector(mapCriteria(() => value));
}

/**
 * Validate and freeze. Throws RangeError when a field is missing, not finite,
 * or outside [0, 10].
 */
export function createScoreVector(values: Record<Criterion, number>): ScoreVector {
  return Object.freeze(
    mapCriteria((c) => {
      const v: unknown = values[c];
      if (typeof v !== "number" || !Number.isFinite(v) || v < SCORE_MIN || v > SCORE_MAX) {
        throw new RangeError(`Score for ${c} must be a number in [${SCORE_MIN}, ${SCORE_MAX}], got ${String(v)}`);
      }
      return v;
    })
  );
}

export function weightSum(weights: WeightTable): number {
  return CRITERIA.reduce((acc, c) => acc + weights[c], 0);
}

export function assertWeightsSumToOne(weights: WeightTable): void {
  const sum = weightSum(weights);
  if (!Number.isFinite(sum) || Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigurationError(`Score weights must sum to 1.0, got ${sum}`);
  }
}

export function weightedSum(vector: ScoreVector, weights: WeightTable): number {
  assertWeightsSumToOne(weights);
  return CRITERIA.reduce((acc, c) => acc + vector[c] * weights[c], 0);
}

/**
 * Per field: Σ(value_i * confidence_i) / Σ(confidence_i) over inputs with
 * confidence > 0. Zero vector when no input has positive confidence.
 */
export function confidenceWeightedAverage(vectors: ScoreVector[], confidences: number[]): ScoreVector {
  if (vectors.length !== confidences.length) {
    throw new RangeError(`Expected one confidence per vector, got ${confidences.length} for ${vectors.length}`);
  }
  const contributing = vectors
    .map((vector, i) => ({ vector, confidence: confidences[i] }))
    .filter((entry) => entry.confidence > 0);
  const totalConfidence = contributing.reduce((acc, entry) => acc + entry.confidence, 0);
  if (contributing.length === 0 || totalConfidence === 0) return zeroScoreVector();

  return createScoreVector(
    mapCriteria((c) => {
      const sum = contributing.reduce((acc, entry) => acc + entry.vector[c] * entry.confidence, 0);
      // Float error can land a hair outside the range on all-0 or all-10 inputs.
      return Math.min(SCORE_MAX, Math.max(SCORE_MIN, sum / totalConfidence));
    })
  );
}

/** Unweighted mean across vectors; zero vector for an empty list. */
export function meanScoreVector(vectors: ScoreVector[]): ScoreVector {
  return confidenceWeightedAverage(
    vectors,
    vectors.map(() => 1)
  );
}
