/**
 * Result rendering: JSON record (default) or a plain-text report.
 */

import type { AssessmentResult } from "../domain/assessment/assessment.types";

export type OutputFormat = "json" | "text";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "text"];

const RULE = "=".repeat(72);
const THIN_RULE = "-".repeat(40);

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function formatJson(result: AssessmentResult): string {
  return JSON.stringify(result, null, 2) + "\n";
}

export type TextReportOptions = {
  /** Printed in the header when given; omitted otherwise so output stays reproducible. */
  generatedAt?: Date;
};

export function formatTextReport(result: AssessmentResult, options: TextReportOptions = {}): string {
  const lines: string[] = [RULE, "MIGRATION READINESS ASSESSMENT REPORT", RULE];
  if (options.generatedAt) {
    lines.push(`Assessment date: ${options.generatedAt.toISOString()}`);
  }

  if (result.categories?.length) {
    lines.push("", "RESULTS BY CATEGORY", THIN_RULE);
    for (const c of result.categories) {
      lines.push("", `${(c.label ?? c.factor).toUpperCase()}`);
      lines.push(`  Category score: ${c.score.toFixed(1)}`);
      lines.push(`  Guidance: ${c.guidance}`);
      for (const a of c.answers) {
        lines.push(`    ${a.question}: ${a.answer}`);
      }
    }
  }

  lines.push("", "FACTOR CONTRIBUTIONS", THIN_RULE);
  for (const b of result.breakdown) {
    lines.push(
      `  ${b.factor}: score ${b.normalizedScore.toFixed(2)} × weight ${b.weight.toFixed(2)} = ${b.contribution.toFixed(2)}`
    );
  }

  const { recommendation } = result;
  lines.push("", RULE, "OVERALL RECOMMENDATION", RULE);
  lines.push(`Composite score: ${result.compositeScore.toFixed(2)}/10`);
  lines.push(`Band: ${result.recommendationBand}`);
  lines.push(`Recommendation: ${recommendation.tier}`);
  lines.push(`Confidence: ${recommendation.confidence}`);
  lines.push("", `Rationale: ${recommendation.rationale}`, "", "Next steps:");
  recommendation.nextSteps.forEach((step, i) => lines.push(`  ${i + 1}. ${step}`));
  lines.push(RULE);

  return lines.join("\n") + "\n";
}

export function formatResult(result: AssessmentResult, format: OutputFormat, options?: TextReportOptions): string {
  return format === "text" ? formatTextReport(result, options) : formatJson(result);
}
