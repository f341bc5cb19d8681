/**
 * Assessment configuration: built-in defaults, optionally overridden by a JSON
 * file (`--config <file>` or the ASSESSMENT_CONFIG env var). Loaded once per run.
 */

import {
  AssessmentConfigFileSchema,
  type AssessmentConfig,
  type AssessmentConfigFile,
  type Factor,
} from "../domain/assessment/assessment.schema";
import type { ValidationErrorKind } from "../domain/assessment/assessment.errors";
import { FileAccessError } from "../domain/assessment/assessment.errors";
import { ASSESSMENT_CONFIG_ENV, DEFAULT_ASSESSMENT_CONFIG } from "../config/assessmentDefaults";
import { parseWithSchema, readInputFile } from "./assessmentImport";
import { dlog } from "./debug";

function configIssueKind(field: string): ValidationErrorKind {
  if (field.startsWith("factors")) return "InvalidFactorDefinition";
  if (field.startsWith("thresholds") || field.startsWith("scoreRange") || field.startsWith("strongRecommendationMin")) {
    return "InvalidThresholds";
  }
  return "MalformedInput";
}

/** Overlay a parsed config file on a base config. Absent fields keep the base value. */
export function mergeAssessmentConfig(base: AssessmentConfig, overrides: AssessmentConfigFile): AssessmentConfig {
  return {
    factors: overrides.factors ?? base.factors,
    scoreRange: overrides.scoreRange ?? base.scoreRange,
    thresholds: { ...base.thresholds, ...overrides.thresholds },
    strongRecommendationMin: overrides.strongRecommendationMin ?? base.strongRecommendationMin,
    weightTolerance: overrides.weightTolerance ?? base.weightTolerance,
  };
}

export function withFactors(config: AssessmentConfig, factors: Factor[]): AssessmentConfig {
  return { ...config, factors };
}

/** Validate raw JSON as a config file (unknown keys rejected) and merge it over the defaults. */
export function parseAssessmentConfig(
  data: unknown,
  base: AssessmentConfig = DEFAULT_ASSESSMENT_CONFIG
): AssessmentConfig {
  const overrides = parseWithSchema(AssessmentConfigFileSchema, data, undefined, configIssueKind);
  return mergeAssessmentConfig(base, overrides);
}

/**
 * Resolve the run's config: explicit path, then ASSESSMENT_CONFIG, then defaults.
 */
export async function loadAssessmentConfig(
  filePath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<AssessmentConfig> {
  const source = filePath ?? env[ASSESSMENT_CONFIG_ENV];
  if (!source) {
    dlog("[config] using defaults");
    return DEFAULT_ASSESSMENT_CONFIG;
  }

  const doc = await readInputFile(source);
  if (doc.format !== "json") {
    throw new FileAccessError(source, "config must be a JSON file");
  }
  const config = parseAssessmentConfig(doc.data);
  dlog("[config] loaded", { source, factorCount: config.factors.length });
  return config;
}
