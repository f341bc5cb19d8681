import { z } from "zod";

/**
 * Enums (tight + explicit = consistency everywhere)
 */
export const RecommendationBandSchema = z.enum(["SeparateInstance", "EnterpriseIntegration", "Mixed"]);
export type RecommendationBand = z.infer<typeof RecommendationBandSchema>;

export const RecommendationTierSchema = z.enum([
  "SEPARATE_INSTANCE_STRONGLY_RECOMMENDED",
  "SEPARATE_INSTANCE_RECOMMENDED",
  "HYBRID_EVALUATION_REQUIRED",
  "ENTERPRISE_INTEGRATION_RECOMMENDED",
]);
export type RecommendationTier = z.infer<typeof RecommendationTierSchema>;

export const ConfidenceLevelSchema = z.enum(["HIGH", "MEDIUM"]);
export type ConfidenceLevel = z.infer<typeof ConfidenceLevelSchema>;

/**
 * Factor definitions (static configuration, loaded once per run).
 */
export const QuestionSchema = z.object({
  key: z.string().trim().min(1),
  label: z.string().optional(),
});
export type Question = z.infer<typeof QuestionSchema>;

export const FactorSchema = z.object({
  name: z.string().trim().min(1),
  weight: z.number(),
  label: z.string().optional(),
  /** When present, the factor's raw score is the mean of these answers. */
  questions: z.array(QuestionSchema).optional(),
});
export type Factor = z.infer<typeof FactorSchema>;

/** Inclusive bounds of a raw score. */
export const ScoreRangeSchema = z.object({
  min: z.number(),
  max: z.number(),
});
export type ScoreRange = z.infer<typeof ScoreRangeSchema>;

/** Inclusive lower bounds of the upper two bands on the normalised 0..10 scale. */
export const BandThresholdsSchema = z.object({
  separateInstanceMin: z.number(),
  mixedMin: z.number(),
});
export type BandThresholds = z.infer<typeof BandThresholdsSchema>;

export const AssessmentConfigSchema = z.object({
  factors: z.array(FactorSchema),
  scoreRange: ScoreRangeSchema,
  thresholds: BandThresholdsSchema,
  /** SeparateInstance scores at or above this are a strong recommendation. */
  strongRecommendationMin: z.number(),
  /** Allowed distance of the weight sum from 1.0. */
  weightTolerance: z.number().nonnegative(),
});
export type AssessmentConfig = z.infer<typeof AssessmentConfigSchema>;

/** Shape of a config file: everything optional, merged over the defaults. */
export const AssessmentConfigFileSchema = z
  .object({
    factors: z.array(FactorSchema).optional(),
    scoreRange: ScoreRangeSchema.optional(),
    thresholds: BandThresholdsSchema.partial().optional(),
    strongRecommendationMin: z.number().optional(),
    weightTolerance: z.number().nonnegative().optional(),
  })
  .strict();
export type AssessmentConfigFile = z.infer<typeof AssessmentConfigFileSchema>;

/**
 * Responses (supplied per invocation).
 */
export const ResponseSchema = z.object({
  factor: z.string().trim().min(1),
  rawScore: z.number(),
});
export type Response = z.infer<typeof ResponseSchema>;

/** `{ factor: score }` */
export const ResponseMapSchema = z.record(z.string(), z.number());

/** `[{ factor, score }]` */
export const ResponseListSchema = z.array(
  z.object({
    factor: z.string().trim().min(1),
    score: z.number(),
  })
);

/** `{ factor: { question: score } | score }` */
export const QuestionnaireAnswersSchema = z.record(
  z.string(),
  z.union([z.number(), z.record(z.string(), z.number())])
);
export type QuestionnaireAnswers = z.infer<typeof QuestionnaireAnswersSchema>;
