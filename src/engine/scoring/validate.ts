/**
 * Input validation for the assessment scorer. Every check runs before any
 * arithmetic; the first failure is returned and scoring does not proceed.
 *
 * Order: factor definitions → weight sum → range/thresholds → responses.
 */

import type { AssessmentConfig, Response } from "../../domain/assessment/assessment.schema";
import type { AssessmentInput } from "../../domain/assessment/assessment.types";
import { ValidationError } from "../../domain/assessment/assessment.errors";
import { inClosedRange, sum, sumApproxOne } from "./numeric";

export type ValidationOutcome<T> = { ok: true; value: T } | { ok: false; error: ValidationError };

/** Responses keyed by factor name, in factor declaration order. */
export type ValidatedAssessment = {
  config: AssessmentConfig;
  scores: Map<string, number>;
};

function fail<T>(error: ValidationError): ValidationOutcome<T> {
  return { ok: false, error };
}

export function validateFactors(config: AssessmentConfig): ValidationError | null {
  const { factors, weightTolerance } = config;
  if (factors.length === 0) {
    return new ValidationError("InvalidFactorDefinition", "At least one factor is required", "factors");
  }

  const seen = new Set<string>();
  for (const [i, factor] of factors.entries()) {
    const name = factor.name.trim();
    if (name === "") {
      return new ValidationError("InvalidFactorDefinition", `factors[${i}] has an empty name`, `factors[${i}].name`);
    }
    if (seen.has(name)) {
      return new ValidationError("InvalidFactorDefinition", `Factor "${name}" is defined more than once`, name);
    }
    seen.add(name);
    if (!inClosedRange(factor.weight, 0, 1)) {
      return new ValidationError(
        "InvalidFactorDefinition",
        `Factor "${name}" weight must be in [0, 1], got ${factor.weight}`,
        name,
        { weight: factor.weight }
      );
    }
    const keys = new Set<string>();
    for (const q of factor.questions ?? []) {
      if (keys.has(q.key)) {
        return new ValidationError(
          "InvalidFactorDefinition",
          `Question "${q.key}" appears more than once in factor "${name}"`,
          `${name}.${q.key}`
        );
      }
      keys.add(q.key);
    }
  }

  const weights = factors.map((f) => f.weight);
  if (!sumApproxOne(weights, weightTolerance)) {
    const total = sum(weights);
    return new ValidationError(
      "InvalidWeightSum",
      `Factor weights must sum to 1.0 (±${weightTolerance}), got ${total}`,
      "factors",
      { weightSum: total }
    );
  }
  return null;
}

export function validateThresholds(config: AssessmentConfig): ValidationError | null {
  const { scoreRange, thresholds, strongRecommendationMin } = config;
  if (!Number.isFinite(scoreRange.min) || !Number.isFinite(scoreRange.max) || scoreRange.min >= scoreRange.max) {
    return new ValidationError(
      "InvalidThresholds",
      `Score range min must be below max, got [${scoreRange.min}, ${scoreRange.max}]`,
      "scoreRange"
    );
  }
  const { separateInstanceMin, mixedMin } = thresholds;
  if (!inClosedRange(separateInstanceMin, 0, 10)) {
    return new ValidationError(
      "InvalidThresholds",
      `separateInstanceMin must be in [0, 10], got ${separateInstanceMin}`,
      "thresholds.separateInstanceMin"
    );
  }
  if (!inClosedRange(mixedMin, 0, 10)) {
    return new ValidationError(
      "InvalidThresholds",
      `mixedMin must be in [0, 10], got ${mixedMin}`,
      "thresholds.mixedMin"
    );
  }
  if (mixedMin >= separateInstanceMin) {
    return new ValidationError(
      "InvalidThresholds",
      `mixedMin (${mixedMin}) must be below separateInstanceMin (${separateInstanceMin})`,
      "thresholds"
    );
  }
  if (!inClosedRange(strongRecommendationMin, separateInstanceMin, 10)) {
    return new ValidationError(
      "InvalidThresholds",
      `strongRecommendationMin must be in [${separateInstanceMin}, 10], got ${strongRecommendationMin}`,
      "strongRecommendationMin"
    );
  }
  return null;
}

export function validateResponses(
  config: AssessmentConfig,
  responses: Response[]
): ValidationOutcome<Map<string, number>> {
  const known = new Set(config.factors.map((f) => f.name));
  const byFactor = new Map<string, number>();

  for (const r of responses) {
    if (byFactor.has(r.factor)) {
      return fail(
        new ValidationError("DuplicateFactorResponse", `More than one response for factor "${r.factor}"`, r.factor)
      );
    }
    if (!known.has(r.factor)) {
      return fail(
        new ValidationError("UnknownFactorResponse", `Response names unknown factor "${r.factor}"`, r.factor)
      );
    }
    byFactor.set(r.factor, r.rawScore);
  }

  const { min, max } = config.scoreRange;
  const scores = new Map<string, number>();
  for (const factor of config.factors) {
    const raw = byFactor.get(factor.name);
    if (raw === undefined) {
      return fail(
        new ValidationError("MissingFactorResponse", `No response for factor "${factor.name}"`, factor.name)
      );
    }
    if (!inClosedRange(raw, min, max)) {
      return fail(
        new ValidationError(
          "OutOfRangeScore",
          `Score for "${factor.name}" must be in [${min}, ${max}], got ${raw}`,
          factor.name,
          { rawScore: raw, min, max }
        )
      );
    }
    scores.set(factor.name, raw);
  }
  return { ok: true, value: scores };
}

/**
 * Full validation of one assessment. Returns the scores keyed by factor, or the
 * first error found.
 */
export function validateAssessment(input: AssessmentInput): ValidationOutcome<ValidatedAssessment> {
  const factorError = validateFactors(input.config);
  if (factorError) return fail(factorError);

  const thresholdError = validateThresholds(input.config);
  if (thresholdError) return fail(thresholdError);

  const responses = validateResponses(input.config, input.responses);
  if (!responses.ok) return responses;

  return { ok: true, value: { config: input.config, scores: responses.value } };
}
