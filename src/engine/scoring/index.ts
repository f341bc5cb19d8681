export { scoreAssessment, normalizeScore } from "./computeAssessmentScore";
export { aggregateQuestionnaire, assessQuestionnaire } from "./questionnaire";
export {
  getRecommendationBand,
  getRecommendationTier,
  getRecommendation,
  getCategoryGuidance,
} from "./classify";
export { validateAssessment, validateFactors, validateThresholds, validateResponses } from "./validate";
export type { ValidationOutcome, ValidatedAssessment } from "./validate";
