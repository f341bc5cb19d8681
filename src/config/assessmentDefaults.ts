import type {
  AssessmentConfig,
  BandThresholds,
  Factor,
  ScoreRange,
} from "../domain/assessment/assessment.schema";

/** Raw scores are 0–10 inclusive unless a config file says otherwise. */
export const DEFAULT_SCORE_RANGE: ScoreRange = { min: 0, max: 10 };

/** ≥ 7 separate instance, ≥ 4 mixed, below 4 enterprise integration. */
export const DEFAULT_BAND_THRESHOLDS: BandThresholds = {
  separateInstanceMin: 7,
  mixedMin: 4,
};

export const DEFAULT_STRONG_RECOMMENDATION_MIN = 7.5;

export const DEFAULT_WEIGHT_TOLERANCE = 1e-6;

/** Env var naming a JSON config file used when --config is not given. */
export const ASSESSMENT_CONFIG_ENV = "ASSESSMENT_CONFIG";

/** Decimal places kept on the composite score. */
export const COMPOSITE_SCORE_DECIMALS = 6;

/**
 * Default readiness factors. Each is answered through four questionnaire items,
 * or directly with a single score.
 */
export const DEFAULT_FACTORS: Factor[] = [
  {
    name: "organizational_autonomy",
    label: "Organizational autonomy",
    weight: 0.25,
    questions: [
      { key: "budget_control", label: "Division controls its own budget" },
      { key: "decision_speed", label: "Division can decide on its own timeline" },
      { key: "strategic_alignment", label: "Division priorities differ from enterprise priorities" },
      { key: "performance_accountability", label: "Division owns its outcomes" },
    ],
  },
  {
    name: "technical_complexity",
    label: "Technical complexity",
    weight: 0.2,
    questions: [
      { key: "integration_complexity", label: "Few enterprise integrations are required" },
      { key: "data_sovereignty", label: "Data must stay under division control" },
      { key: "security_requirements", label: "Security requirements are division-specific" },
      { key: "customization_level", label: "Workflows are heavily customised" },
    ],
  },
  {
    name: "timeline_criticality",
    label: "Timeline criticality",
    weight: 0.2,
    questions: [
      { key: "business_urgency", label: "Business pressure to deliver" },
      { key: "compliance_deadlines", label: "Regulatory deadlines" },
      { key: "competitive_advantage", label: "Strategic timing" },
      { key: "disruption_tolerance", label: "Sensitivity to delay" },
    ],
  },
  {
    name: "resource_availability",
    label: "Resource availability",
    weight: 0.15,
    questions: [
      { key: "dedicated_team", label: "A dedicated team is available" },
      { key: "funding_model", label: "Funding is flexible" },
      { key: "vendor_relationship", label: "Direct vendor access" },
      { key: "expertise_level", label: "Internal expertise" },
    ],
  },
  {
    name: "risk_tolerance",
    label: "Risk tolerance",
    weight: 0.2,
    questions: [
      { key: "implementation_risk", label: "Low tolerance for implementation failure" },
      { key: "operational_disruption", label: "Sensitivity to downtime" },
      { key: "technology_obsolescence", label: "Need for independent upgrade cycles" },
      { key: "coordination_complexity", label: "Risk from enterprise dependencies" },
    ],
  },
];

export const DEFAULT_ASSESSMENT_CONFIG: AssessmentConfig = {
  factors: DEFAULT_FACTORS,
  scoreRange: DEFAULT_SCORE_RANGE,
  thresholds: DEFAULT_BAND_THRESHOLDS,
  strongRecommendationMin: DEFAULT_STRONG_RECOMMENDATION_MIN,
  weightTolerance: DEFAULT_WEIGHT_TOLERANCE,
};
