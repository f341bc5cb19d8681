export * from "./domain/assessment/assessment.schema";
export * from "./domain/assessment/assessment.types";
export * from "./domain/assessment/assessment.errors";
export * from "./engine/scoring";
export { DEFAULT_ASSESSMENT_CONFIG, DEFAULT_FACTORS, DEFAULT_BAND_THRESHOLDS, DEFAULT_SCORE_RANGE } from "./config/assessmentDefaults";
export { loadAssessmentConfig, parseAssessmentConfig, mergeAssessmentConfig, withFactors } from "./lib/loadAssessmentConfig";
export { loadFactors, loadResponses, parseTable, factorsFromJson, responsesFromJson } from "./lib/assessmentImport";
export type { ResponseInput, ParsedTable } from "./lib/assessmentImport";
export { formatResult, formatJson, formatTextReport } from "./lib/formatReport";
export type { OutputFormat } from "./lib/formatReport";
