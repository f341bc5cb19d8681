/**
 * Questionnaire aggregation: a factor with questions gets the mean of its
 * answers as its raw score. Factors without questions take a single number.
 */

import type { AssessmentConfig, QuestionnaireAnswers, Response } from "../../domain/assessment/assessment.schema";
import type {
  AggregatedQuestionnaire,
  AssessmentResult,
  CategoryAnswer,
  CategoryResult,
} from "../../domain/assessment/assessment.types";
import { ValidationError } from "../../domain/assessment/assessment.errors";
import { getCategoryGuidance } from "./classify";
import { normalizeScore, scoreAssessment } from "./computeAssessmentScore";
import { inClosedRange, mean } from "./numeric";
import { validateFactors, validateThresholds } from "./validate";

/**
 * Turns `{ factor: { question: answer } }` into one Response per factor.
 * Throws ValidationError for unknown factors or questions, unanswered
 * questions, and answers outside the score range.
 */
export function aggregateQuestionnaire(
  config: Pick<AssessmentConfig, "factors" | "scoreRange">,
  answers: QuestionnaireAnswers
): AggregatedQuestionnaire {
  const { factors, scoreRange } = config;
  const known = new Set(factors.map((f) => f.name));
  for (const name of Object.keys(answers)) {
    if (!known.has(name)) {
      throw new ValidationError("UnknownFactorResponse", `Answers name unknown factor "${name}"`, name);
    }
  }

  const responses: Response[] = [];
  const categories: CategoryResult[] = [];

  for (const factor of factors) {
    const given = Object.hasOwn(answers, factor.name) ? answers[factor.name] : undefined;
    if (given === undefined) {
      throw new ValidationError("MissingFactorResponse", `No answers for factor "${factor.name}"`, factor.name);
    }

    const questions = factor.questions ?? [];
    if (questions.length === 0) {
      if (typeof given !== "number") {
        throw new ValidationError(
          "MalformedInput",
          `Factor "${factor.name}" has no questions and takes a single score`,
          factor.name
        );
      }
      responses.push({ factor: factor.name, rawScore: given });
      continue;
    }

    if (typeof given === "number") {
      throw new ValidationError(
        "MalformedInput",
        `Factor "${factor.name}" expects answers keyed by question`,
        factor.name
      );
    }

    const keys = new Set(questions.map((q) => q.key));
    for (const key of Object.keys(given)) {
      if (!keys.has(key)) {
        throw new ValidationError(
          "UnknownFactorResponse",
          `Factor "${factor.name}" has no question "${key}"`,
          `${factor.name}.${key}`
        );
      }
    }

    const categoryAnswers: CategoryAnswer[] = [];
    for (const q of questions) {
      const field = `${factor.name}.${q.key}`;
      const answer = Object.hasOwn(given, q.key) ? given[q.key] : undefined;
      if (answer === undefined) {
        throw new ValidationError("MissingFactorResponse", `Question "${field}" is unanswered`, field);
      }
      if (!inClosedRange(answer, scoreRange.min, scoreRange.max)) {
        throw new ValidationError(
          "OutOfRangeScore",
          `Answer to "${field}" must be in [${scoreRange.min}, ${scoreRange.max}], got ${answer}`,
          field,
          { rawScore: answer, min: scoreRange.min, max: scoreRange.max }
        );
      }
      categoryAnswers.push({
        question: q.key,
        ...(q.label !== undefined && { label: q.label }),
        answer,
      });
    }

    const score = mean(categoryAnswers.map((a) => a.answer));
    responses.push({ factor: factor.name, rawScore: score });
    categories.push({
      factor: factor.name,
      ...(factor.label !== undefined && { label: factor.label }),
      score,
      answers: categoryAnswers,
      guidance: getCategoryGuidance(factor.name, normalizeScore(score, scoreRange)),
    });
  }

  return { responses, categories };
}

/**
 * Score a questionnaire: factor definitions and thresholds are checked first,
 * then answers are aggregated and scored. The result carries the per-category
 * breakdown.
 */
export function assessQuestionnaire(config: AssessmentConfig, answers: QuestionnaireAnswers): AssessmentResult {
  const configError = validateFactors(config) ?? validateThresholds(config);
  if (configError) throw configError;

  const { responses, categories } = aggregateQuestionnaire(config, answers);
  return scoreAssessment({ config, responses }, categories);
}
