/**
 * Dev-only shared invariant helpers for scoring checks.
 * Deterministic predicates — no side effects.
 */

import type { AssessmentResult } from "../domain/assessment/assessment.types";

export function inScoreScale(x: number): boolean {
  return Number.isFinite(x) && x >= 0 && x <= 10;
}

/** Breakdown contributions add up to the composite (before rounding). */
export function contributionsMatchComposite(result: AssessmentResult, tolerance = 1e-6): boolean {
  const total = result.breakdown.reduce((a, b) => a + b.contribution, 0);
  return Math.abs(total - result.compositeScore) <= tolerance;
}

export function sameResult(a: AssessmentResult, b: AssessmentResult): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Deterministic LCG so checks can sweep many inputs reproducibly.
 * Returns values in [0, 1).
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}

/** n non-negative weights summing to 1 (last weight absorbs the remainder). */
export function randomWeights(n: number, rand: () => number): number[] {
  const raw = Array.from({ length: n }, () => rand() + 0.01);
  const total = raw.reduce((a, b) => a + b, 0);
  const weights = raw.map((w) => w / total);
  const head = weights.slice(0, -1).reduce((a, b) => a + b, 0);
  weights[n - 1] = Math.max(0, 1 - head);
  return weights;
}
