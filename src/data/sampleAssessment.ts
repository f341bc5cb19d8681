/**
 * Sample questionnaire answers for a regional utility division weighing a
 * separate instance. Used by `--sample` and as a worked fixture.
 */

import type { QuestionnaireAnswers } from "../domain/assessment/assessment.schema";

export const SAMPLE_QUESTIONNAIRE: QuestionnaireAnswers = {
  organizational_autonomy: {
    budget_control: 8,
    decision_speed: 7,
    strategic_alignment: 9,
    performance_accountability: 8,
  },
  technical_complexity: {
    integration_complexity: 5,
    data_sovereignty: 8,
    security_requirements: 7,
    customization_level: 6,
  },
  timeline_criticality: {
    business_urgency: 7,
    compliance_deadlines: 9,
    competitive_advantage: 6,
    disruption_tolerance: 8,
  },
  resource_availability: {
    dedicated_team: 6,
    funding_model: 7,
    vendor_relationship: 5,
    expertise_level: 6,
  },
  risk_tolerance: {
    implementation_risk: 8,
    operational_disruption: 7,
    technology_obsolescence: 6,
    coordination_complexity: 7,
  },
};
