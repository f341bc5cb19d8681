import { describe, it } from "node:test";
import assert from "node:assert";
import {
  getCategoryGuidance,
  getRecommendation,
  getRecommendationBand,
  getRecommendationTier,
} from "./classify";
import { GENERIC_CATEGORY_GUIDANCE, TIER_GUIDANCE } from "../../config/recommendationGuidance";

describe("getRecommendationBand", () => {
  it("uses ≥ 7 / ≥ 4 by default, boundaries taking the higher band", () => {
    assert.strictEqual(getRecommendationBand(10), "SeparateInstance");
    assert.strictEqual(getRecommendationBand(7), "SeparateInstance");
    assert.strictEqual(getRecommendationBand(6.999999), "Mixed");
    assert.strictEqual(getRecommendationBand(4.000001), "Mixed");
    assert.strictEqual(getRecommendationBand(4), "Mixed");
    assert.strictEqual(getRecommendationBand(3.999999), "EnterpriseIntegration");
    assert.strictEqual(getRecommendationBand(0), "EnterpriseIntegration");
  });

  it("honours custom thresholds", () => {
    const thresholds = { separateInstanceMin: 8, mixedMin: 3 };
    assert.strictEqual(getRecommendationBand(7.5, thresholds), "Mixed");
    assert.strictEqual(getRecommendationBand(8, thresholds), "SeparateInstance");
    assert.strictEqual(getRecommendationBand(3, thresholds), "Mixed");
    assert.strictEqual(getRecommendationBand(2.9, thresholds), "EnterpriseIntegration");
  });
});

describe("getRecommendationTier", () => {
  it("splits the separate-instance band at the strong cut-off", () => {
    assert.strictEqual(getRecommendationTier(7.5, "SeparateInstance", 7.5), "SEPARATE_INSTANCE_STRONGLY_RECOMMENDED");
    assert.strictEqual(getRecommendationTier(7.49, "SeparateInstance", 7.5), "SEPARATE_INSTANCE_RECOMMENDED");
  });

  it("maps the other bands one-to-one", () => {
    assert.strictEqual(getRecommendationTier(5, "Mixed", 7.5), "HYBRID_EVALUATION_REQUIRED");
    assert.strictEqual(getRecommendationTier(2, "EnterpriseIntegration", 7.5), "ENTERPRISE_INTEGRATION_RECOMMENDED");
  });
});

describe("getRecommendation", () => {
  it("attaches confidence, rationale and next steps for the tier", () => {
    const rec = getRecommendation(8.2, "SeparateInstance", { strongRecommendationMin: 7.5 });
    assert.strictEqual(rec.tier, "SEPARATE_INSTANCE_STRONGLY_RECOMMENDED");
    assert.strictEqual(rec.confidence, "HIGH");
    assert.strictEqual(rec.nextSteps.length, 4);
    assert.strictEqual(rec.nextSteps[0], "Proceed with separate instance architecture planning");
  });

  it("returns a copy of the next steps", () => {
    const rec = getRecommendation(5, "Mixed", { strongRecommendationMin: 7.5 });
    rec.nextSteps.push("extra");
    assert.strictEqual(TIER_GUIDANCE.HYBRID_EVALUATION_REQUIRED.nextSteps.length, 4);
  });
});

describe("getCategoryGuidance", () => {
  it("picks strong / moderate / low text by score", () => {
    assert.strictEqual(
      getCategoryGuidance("organizational_autonomy", 8),
      "High autonomy requirements strongly favor separate instance deployment"
    );
    assert.strictEqual(
      getCategoryGuidance("organizational_autonomy", 6),
      "Moderate autonomy needs support separate instance consideration"
    );
    assert.strictEqual(
      getCategoryGuidance("organizational_autonomy", 5.9),
      "Current autonomy requirements may be met through enterprise integration"
    );
  });

  it("falls back to generic text for unknown factors", () => {
    assert.strictEqual(getCategoryGuidance("budget", 9), "Strongly favors separate instance deployment");
  });

  it("uses generic text for factors named like object builtins", () => {
    assert.strictEqual(getCategoryGuidance("constructor", 9), "Strongly favors separate instance deployment");
    assert.strictEqual(getCategoryGuidance("toString", 5), GENERIC_CATEGORY_GUIDANCE.low);
  });
});
