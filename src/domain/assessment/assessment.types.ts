/**
 * Assessment result types — derived per invocation, never stored.
 */

import type {
  AssessmentConfig,
  ConfidenceLevel,
  RecommendationBand,
  RecommendationTier,
  Response,
} from "./assessment.schema";

export type AssessmentInput = {
  config: AssessmentConfig;
  responses: Response[];
};

/** Per-factor share of the composite score. */
export type FactorContribution = {
  factor: string;
  label?: string;
  weight: number;
  rawScore: number;
  /** rawScore mapped onto 0..10. */
  normalizedScore: number;
  /** weight × normalizedScore. */
  contribution: number;
};

export type Recommendation = {
  tier: RecommendationTier;
  confidence: ConfidenceLevel;
  rationale: string;
  nextSteps: string[];
};

export type CategoryAnswer = {
  question: string;
  label?: string;
  answer: number;
};

/** Questionnaire breakdown for one factor. */
export type CategoryResult = {
  factor: string;
  label?: string;
  /** Mean of the answers, on the raw score scale. */
  score: number;
  answers: CategoryAnswer[];
  guidance: string;
};

export type AssessmentResult = {
  /** 0..10 composite score. */
  compositeScore: number;
  recommendationBand: RecommendationBand;
  breakdown: FactorContribution[];
  recommendation: Recommendation;
  categories?: CategoryResult[];
};

/** Responses produced from questionnaire answers, with the per-factor detail kept. */
export type AggregatedQuestionnaire = {
  responses: Response[];
  categories: CategoryResult[];
};
