/**
 * Sweeps seeded random factor sets and responses through the scorer and checks
 * that every composite lies in 0–10, contributions add up, and rescoring the
 * same input gives the same result.
 * Run from repo root: npx tsx __dev__/scoreBoundsCheck.ts
 * Exits 0 if all checks pass, non-zero otherwise.
 */

import type { AssessmentConfig } from "../src/domain/assessment/assessment.schema";
import { DEFAULT_ASSESSMENT_CONFIG } from "../src/config/assessmentDefaults";
import { scoreAssessment } from "../src/engine/scoring";
import {
  contributionsMatchComposite,
  inScoreScale,
  randomWeights,
  sameResult,
  seededRandom,
} from "../src/dev/invariants";

const ITERATIONS = 500;

function run(): number {
  const rand = seededRandom(20240611);
  let failures = 0;

  for (let i = 0; i < ITERATIONS; i++) {
    const n = 1 + Math.floor(rand() * 8);
    const weights = randomWeights(n, rand);
    const config: AssessmentConfig = {
      ...DEFAULT_ASSESSMENT_CONFIG,
      factors: weights.map((weight, j) => ({ name: `f${j}`, weight })),
    };
    const responses = config.factors.map((f) => ({ factor: f.name, rawScore: Math.round(rand() * 100) / 10 }));

    const first = scoreAssessment({ config, responses });
    const second = scoreAssessment({ config, responses });

    if (!inScoreScale(first.compositeScore)) {
      console.error("[scoreBoundsCheck] FAIL: composite out of 0–10 at iteration", i, first.compositeScore);
      failures++;
    }
    if (!contributionsMatchComposite(first)) {
      console.error("[scoreBoundsCheck] FAIL: contributions do not add up at iteration", i);
      failures++;
    }
    if (!sameResult(first, second)) {
      console.error("[scoreBoundsCheck] FAIL: rescoring changed the result at iteration", i);
      failures++;
    }
  }

  if (failures === 0) {
    console.log(`[scoreBoundsCheck] OK: ${ITERATIONS} random assessments within bounds and reproducible`);
  }
  return failures === 0 ? 0 : 1;
}

process.exit(run());
