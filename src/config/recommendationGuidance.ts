/**
 * Narrative text attached to results. Kept apart from the scoring thresholds so
 * wording can change without touching the engine.
 */

import type { ConfidenceLevel, RecommendationTier } from "../domain/assessment/assessment.schema";

export type TierGuidance = {
  confidence: ConfidenceLevel;
  rationale: string;
  nextSteps: string[];
};

export const TIER_GUIDANCE: Record<RecommendationTier, TierGuidance> = {
  SEPARATE_INSTANCE_STRONGLY_RECOMMENDED: {
    confidence: "HIGH",
    rationale:
      "Multiple factors strongly favor separate instance deployment for operational independence and accelerated delivery.",
    nextSteps: [
      "Proceed with separate instance architecture planning",
      "Amend the statement of work to redefine scope",
      "Create a dedicated project timeline and resource plan",
      "Establish an independent vendor relationship framework",
    ],
  },
  SEPARATE_INSTANCE_RECOMMENDED: {
    confidence: "MEDIUM",
    rationale:
      "Several factors favor a separate instance, though some considerations may benefit from additional evaluation.",
    nextSteps: [
      "Run a detailed cost-benefit analysis comparing both approaches",
      "Validate resource availability and timeline requirements",
      "Develop risk mitigation strategies for an independent implementation",
      "Confirm the deployment approach with stakeholders",
    ],
  },
  HYBRID_EVALUATION_REQUIRED: {
    confidence: "MEDIUM",
    rationale: "Mixed factors require detailed analysis of specific organizational priorities and constraints.",
    nextSteps: [
      "Perform a detailed stakeholder requirements analysis",
      "Pilot both approaches",
      "Develop comparative implementation scenarios",
      "Schedule a decision workshop with key stakeholders",
    ],
  },
  ENTERPRISE_INTEGRATION_RECOMMENDED: {
    confidence: "MEDIUM",
    rationale:
      "Current factors suggest an enterprise integration approach may align better with organizational needs.",
    nextSteps: [
      "Develop an enterprise integration timeline and coordination plan",
      "Establish a shared governance and decision-making framework",
      "Create a cross-division communication and change management strategy",
      "Define shared infrastructure requirements and dependencies",
    ],
  },
};

/** Category guidance cut-offs on the normalised 0..10 scale. */
export const CATEGORY_GUIDANCE_THRESHOLDS = {
  strongMin: 7.5,
  moderateMin: 6.0,
} as const;

export type CategoryGuidance = {
  strong: string;
  moderate: string;
  low: string;
};

export const CATEGORY_GUIDANCE: Record<string, CategoryGuidance> = {
  organizational_autonomy: {
    strong: "High autonomy requirements strongly favor separate instance deployment",
    moderate: "Moderate autonomy needs support separate instance consideration",
    low: "Current autonomy requirements may be met through enterprise integration",
  },
  technical_complexity: {
    strong: "Technical factors strongly support a simplified separate instance architecture",
    moderate: "Technical complexity is moderate; weigh integration against independence",
    low: "Technical requirements may benefit from shared enterprise infrastructure",
  },
  timeline_criticality: {
    strong: "Critical timeline requirements strongly favor an accelerated separate instance",
    moderate: "Timeline considerations support a separate instance for faster delivery",
    low: "Timeline flexibility allows for coordinated enterprise implementation",
  },
  resource_availability: {
    strong: "Strong resource availability enables a dedicated separate instance implementation",
    moderate: "Adequate resources are available for a separate instance approach",
    low: "Resource constraints may benefit from a shared enterprise approach",
  },
  risk_tolerance: {
    strong: "Risk profile strongly supports an independent implementation",
    moderate: "Risk considerations favor a separate instance for reduced dependencies",
    low: "Risk tolerance may accommodate enterprise coordination requirements",
  },
};

/** Used for factors that have no entry in CATEGORY_GUIDANCE. */
export const GENERIC_CATEGORY_GUIDANCE: CategoryGuidance = {
  strong: "Strongly favors separate instance deployment",
  moderate: "Supports separate instance consideration",
  low: "May be met through enterprise integration",
};
