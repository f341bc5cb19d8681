/**
 * Composite readiness score (pure functions only).
 * No I/O, no shared state: identical input always yields an identical result.
 */

import type { ScoreRange } from "../../domain/assessment/assessment.schema";
import type {
  AssessmentInput,
  AssessmentResult,
  CategoryResult,
  FactorContribution,
} from "../../domain/assessment/assessment.types";
import { COMPOSITE_SCORE_DECIMALS } from "../../config/assessmentDefaults";
import { dlog } from "../../lib/debug";
import { getRecommendation, getRecommendationBand } from "./classify";
import { clamp, roundTo, sum } from "./numeric";
import { validateAssessment } from "./validate";

/** Maps a raw score in [min, max] onto 0..10. */
export function normalizeScore(rawScore: number, range: ScoreRange): number {
  return ((rawScore - range.min) * 10) / (range.max - range.min);
}

/**
 * Score one assessment.
 * compositeScore = Σ weight × normalizedScore, rounded to COMPOSITE_SCORE_DECIMALS
 * and clamped to 0..10, then mapped to a band and recommendation tier.
 * Throws ValidationError (before any arithmetic) when the input is invalid.
 */
export function scoreAssessment(input: AssessmentInput, categories?: CategoryResult[]): AssessmentResult {
  const validated = validateAssessment(input);
  if (!validated.ok) {
    dlog("[scoring] validation failed", { kind: validated.error.kind, field: validated.error.field });
    throw validated.error;
  }

  const { config, scores } = validated.value;
  const breakdown: FactorContribution[] = [];
  for (const factor of config.factors) {
    const rawScore = scores.get(factor.name);
    if (rawScore === undefined) continue;
    const normalizedScore = normalizeScore(rawScore, config.scoreRange);
    breakdown.push({
      factor: factor.name,
      ...(factor.label !== undefined && { label: factor.label }),
      weight: factor.weight,
      rawScore,
      normalizedScore,
      contribution: factor.weight * normalizedScore,
    });
  }

  const rawTotal = sum(breakdown.map((b) => b.contribution));
  const compositeScore = clamp(roundTo(rawTotal, COMPOSITE_SCORE_DECIMALS), 0, 10);
  const recommendationBand = getRecommendationBand(compositeScore, config.thresholds);
  const recommendation = getRecommendation(compositeScore, recommendationBand, config);

  dlog("[scoring] ok", { compositeScore, recommendationBand, tier: recommendation.tier });

  return {
    compositeScore,
    recommendationBand,
    breakdown,
    recommendation,
    ...(categories !== undefined && { categories }),
  };
}
