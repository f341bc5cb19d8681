/**
 * Band and tier classification of a 0..10 composite score.
 */

import type {
  AssessmentConfig,
  BandThresholds,
  RecommendationBand,
  RecommendationTier,
} from "../../domain/assessment/assessment.schema";
import type { Recommendation } from "../../domain/assessment/assessment.types";
import { DEFAULT_BAND_THRESHOLDS } from "../../config/assessmentDefaults";
import {
  CATEGORY_GUIDANCE,
  CATEGORY_GUIDANCE_THRESHOLDS,
  GENERIC_CATEGORY_GUIDANCE,
  TIER_GUIDANCE,
} from "../../config/recommendationGuidance";

/**
 * ≥ separateInstanceMin → SeparateInstance; ≥ mixedMin → Mixed; otherwise
 * EnterpriseIntegration. A score on a boundary takes the higher band.
 */
export function getRecommendationBand(
  score: number,
  thresholds: BandThresholds = DEFAULT_BAND_THRESHOLDS
): RecommendationBand {
  if (score >= thresholds.separateInstanceMin) return "SeparateInstance";
  if (score >= thresholds.mixedMin) return "Mixed";
  return "EnterpriseIntegration";
}

export function getRecommendationTier(
  score: number,
  band: RecommendationBand,
  strongRecommendationMin: number
): RecommendationTier {
  switch (band) {
    case "SeparateInstance":
      return score >= strongRecommendationMin
        ? "SEPARATE_INSTANCE_STRONGLY_RECOMMENDED"
        : "SEPARATE_INSTANCE_RECOMMENDED";
    case "Mixed":
      return "HYBRID_EVALUATION_REQUIRED";
    case "EnterpriseIntegration":
      return "ENTERPRISE_INTEGRATION_RECOMMENDED";
  }
}

export function getRecommendation(
  score: number,
  band: RecommendationBand,
  config: Pick<AssessmentConfig, "strongRecommendationMin">
): Recommendation {
  const tier = getRecommendationTier(score, band, config.strongRecommendationMin);
  const guidance = TIER_GUIDANCE[tier];
  return {
    tier,
    confidence: guidance.confidence,
    rationale: guidance.rationale,
    nextSteps: [...guidance.nextSteps],
  };
}

/** Narrative for one questionnaire category, by its score normalised onto 0..10. */
export function getCategoryGuidance(factor: string, score: number): string {
  const specific = Object.hasOwn(CATEGORY_GUIDANCE, factor) ? CATEGORY_GUIDANCE[factor] : undefined;
  const text = specific ?? GENERIC_CATEGORY_GUIDANCE;
  if (score >= CATEGORY_GUIDANCE_THRESHOLDS.strongMin) return text.strong;
  if (score >= CATEGORY_GUIDANCE_THRESHOLDS.moderateMin) return text.moderate;
  return text.low;
}
