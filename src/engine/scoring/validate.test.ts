import { describe, it } from "node:test";
import assert from "node:assert";
import { validateAssessment, type ValidationOutcome } from "./validate";
import type { AssessmentConfig, Factor, Response } from "../../domain/assessment/assessment.schema";
import type { ValidationErrorKind } from "../../domain/assessment/assessment.errors";
import { DEFAULT_ASSESSMENT_CONFIG } from "../../config/assessmentDefaults";

const FACTORS: Factor[] = [
  { name: "Autonomy", weight: 0.25 },
  { name: "Timeline", weight: 0.2 },
  { name: "Complexity", weight: 0.2 },
  { name: "Resources", weight: 0.15 },
  { name: "RiskTolerance", weight: 0.2 },
];

const SCORES = { Autonomy: 9, Timeline: 8, Complexity: 7, Resources: 6, RiskTolerance: 8 };

function makeConfig(overrides: Partial<AssessmentConfig> = {}): AssessmentConfig {
  return { ...DEFAULT_ASSESSMENT_CONFIG, factors: FACTORS, ...overrides };
}

function toResponses(scores: Record<string, number>): Response[] {
  return Object.entries(scores).map(([factor, rawScore]) => ({ factor, rawScore }));
}

function expectFailure(outcome: ValidationOutcome<unknown>, kind: ValidationErrorKind, field?: string) {
  assert(!outcome.ok);
  assert.strictEqual(outcome.error.kind, kind);
  if (field !== undefined) assert.strictEqual(outcome.error.field, field);
}

describe("validateAssessment", () => {
  it("accepts a complete, in-range response set and keys scores by factor", () => {
    const outcome = validateAssessment({ config: makeConfig(), responses: toResponses(SCORES) });
    assert(outcome.ok);
    assert.deepStrictEqual([...outcome.value.scores.entries()], Object.entries(SCORES));
  });

  it("returns scores in factor declaration order regardless of response order", () => {
    const reversed = toResponses(SCORES).reverse();
    const outcome = validateAssessment({ config: makeConfig(), responses: reversed });
    assert(outcome.ok);
    assert.deepStrictEqual([...outcome.value.scores.keys()], FACTORS.map((f) => f.name));
  });

  it("rejects weights summing to 0.99", () => {
    const factors = FACTORS.map((f) => (f.name === "RiskTolerance" ? { ...f, weight: 0.19 } : f));
    const outcome = validateAssessment({ config: makeConfig({ factors }), responses: toResponses(SCORES) });
    expectFailure(outcome, "InvalidWeightSum", "factors");
  });

  it("rejects weights summing to 1.01", () => {
    const factors = FACTORS.map((f) => (f.name === "RiskTolerance" ? { ...f, weight: 0.21 } : f));
    const outcome = validateAssessment({ config: makeConfig({ factors }), responses: toResponses(SCORES) });
    expectFailure(outcome, "InvalidWeightSum", "factors");
  });

  it("accepts float noise in the weight sum within tolerance", () => {
    const factors: Factor[] = [
      { name: "a", weight: 0.1 },
      { name: "b", weight: 0.2 },
      { name: "c", weight: 0.7 },
    ];
    const outcome = validateAssessment({
      config: makeConfig({ factors }),
      responses: toResponses({ a: 1, b: 2, c: 3 }),
    });
    assert(outcome.ok);
  });

  it("rejects an empty factor set", () => {
    const outcome = validateAssessment({ config: makeConfig({ factors: [] }), responses: [] });
    expectFailure(outcome, "InvalidFactorDefinition", "factors");
  });

  it("rejects a weight outside [0, 1]", () => {
    const factors: Factor[] = [
      { name: "a", weight: 1.5 },
      { name: "b", weight: -0.5 },
    ];
    const outcome = validateAssessment({ config: makeConfig({ factors }), responses: toResponses({ a: 1, b: 1 }) });
    expectFailure(outcome, "InvalidFactorDefinition", "a");
  });

  it("rejects duplicate factor names", () => {
    const factors: Factor[] = [
      { name: "a", weight: 0.5 },
      { name: "a", weight: 0.5 },
    ];
    const outcome = validateAssessment({ config: makeConfig({ factors }), responses: toResponses({ a: 1 }) });
    expectFailure(outcome, "InvalidFactorDefinition", "a");
  });

  it("rejects a question key repeated within a factor", () => {
    const factors: Factor[] = [{ name: "a", weight: 1, questions: [{ key: "q1" }, { key: "q1" }] }];
    const outcome = validateAssessment({ config: makeConfig({ factors }), responses: toResponses({ a: 1 }) });
    expectFailure(outcome, "InvalidFactorDefinition", "a.q1");
  });

  it("checks weights before responses", () => {
    const factors = FACTORS.map((f) => (f.name === "Autonomy" ? { ...f, weight: 0.3 } : f));
    const outcome = validateAssessment({ config: makeConfig({ factors }), responses: [] });
    expectFailure(outcome, "InvalidWeightSum");
  });

  it("rejects overlapping band thresholds", () => {
    const outcome = validateAssessment({
      config: makeConfig({ thresholds: { separateInstanceMin: 5, mixedMin: 5 } }),
      responses: toResponses(SCORES),
    });
    expectFailure(outcome, "InvalidThresholds", "thresholds");
  });

  it("rejects a threshold outside the 0–10 scale", () => {
    const outcome = validateAssessment({
      config: makeConfig({ thresholds: { separateInstanceMin: 12, mixedMin: 4 } }),
      responses: toResponses(SCORES),
    });
    expectFailure(outcome, "InvalidThresholds", "thresholds.separateInstanceMin");
  });

  it("rejects an empty score range", () => {
    const outcome = validateAssessment({
      config: makeConfig({ scoreRange: { min: 5, max: 5 } }),
      responses: toResponses(SCORES),
    });
    expectFailure(outcome, "InvalidThresholds", "scoreRange");
  });

  it("rejects a strong-recommendation cut-off below the separate-instance band", () => {
    const outcome = validateAssessment({
      config: makeConfig({ strongRecommendationMin: 6 }),
      responses: toResponses(SCORES),
    });
    expectFailure(outcome, "InvalidThresholds", "strongRecommendationMin");
  });

  it("names the factor that has no response", () => {
    const { Timeline: _omitted, ...rest } = SCORES;
    const outcome = validateAssessment({ config: makeConfig(), responses: toResponses(rest) });
    expectFailure(outcome, "MissingFactorResponse", "Timeline");
    assert(!outcome.ok);
    assert.strictEqual(outcome.error.message, 'No response for factor "Timeline"');
  });

  it("rejects a score of 11 above the declared max of 10", () => {
    const outcome = validateAssessment({
      config: makeConfig(),
      responses: toResponses({ ...SCORES, Autonomy: 11 }),
    });
    expectFailure(outcome, "OutOfRangeScore", "Autonomy");
  });

  it("rejects a negative score", () => {
    const outcome = validateAssessment({
      config: makeConfig(),
      responses: toResponses({ ...SCORES, Resources: -1 }),
    });
    expectFailure(outcome, "OutOfRangeScore", "Resources");
  });

  it("rejects a non-finite score", () => {
    const outcome = validateAssessment({
      config: makeConfig(),
      responses: toResponses({ ...SCORES, Complexity: Number.NaN }),
    });
    expectFailure(outcome, "OutOfRangeScore", "Complexity");
  });

  it("accepts scores on the range bounds", () => {
    const outcome = validateAssessment({
      config: makeConfig(),
      responses: toResponses({ ...SCORES, Autonomy: 10, Resources: 0 }),
    });
    assert(outcome.ok);
  });

  it("rejects a response for an unknown factor", () => {
    const outcome = validateAssessment({
      config: makeConfig(),
      responses: [...toResponses(SCORES), { factor: "Budget", rawScore: 5 }],
    });
    expectFailure(outcome, "UnknownFactorResponse", "Budget");
  });

  it("rejects two responses for the same factor", () => {
    const outcome = validateAssessment({
      config: makeConfig(),
      responses: [...toResponses(SCORES), { factor: "Timeline", rawScore: 5 }],
    });
    expectFailure(outcome, "DuplicateFactorResponse", "Timeline");
  });
});
