/**
 * `migration-assess`: score one assessment from files and emit one result record.
 *
 * Exit codes: 0 ok, 1 validation error, 2 usage error or unreadable/unwritable file.
 */

import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { FileAccessError, isValidationError } from "../domain/assessment/assessment.errors";
import type { AssessmentConfig } from "../domain/assessment/assessment.schema";
import type { AssessmentResult } from "../domain/assessment/assessment.types";
import { assessQuestionnaire, scoreAssessment } from "../engine/scoring";
import { SAMPLE_QUESTIONNAIRE } from "../data/sampleAssessment";
import { loadFactors, loadResponses, type ResponseInput } from "../lib/assessmentImport";
import { loadAssessmentConfig, withFactors } from "../lib/loadAssessmentConfig";
import { formatResult, isOutputFormat, OUTPUT_FORMATS } from "../lib/formatReport";
import { dlog } from "../lib/debug";

export const EXIT_OK = 0;
export const EXIT_VALIDATION_ERROR = 1;
export const EXIT_USAGE_ERROR = 2;

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  /** Clock for the text report header. */
  now?: () => Date;
};

export const USAGE = `Usage: migration-assess (--responses <file> | --sample) [options]

Options:
  -r, --responses <file>  Responses: .json ({factor: score}, [{factor, score}] or
                          {factor: {question: score}}), .csv or .xlsx (factor, score)
  -f, --factors <file>    Factor definitions: .json, .csv or .xlsx (name, weight, label)
  -c, --config <file>     Assessment config JSON (defaults to $ASSESSMENT_CONFIG)
      --format <format>   ${OUTPUT_FORMATS.join(" | ")} (default: json)
  -o, --out <file>        Write the result to a file instead of stdout
      --sample            Score the built-in sample questionnaire
  -h, --help              Show this help
`;

function usageError(io: CliIO, message: string): number {
  io.stderr(`${message}\n\n${USAGE}`);
  return EXIT_USAGE_ERROR;
}

function score(input: ResponseInput, config: AssessmentConfig): AssessmentResult {
  return input.kind === "questionnaire"
    ? assessQuestionnaire(config, input.answers)
    : scoreAssessment({ config, responses: input.responses });
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      responses: { type: "string", short: "r" },
      factors: { type: "string", short: "f" },
      config: { type: "string", short: "c" },
      format: { type: "string", default: "json" },
      out: { type: "string", short: "o" },
      sample: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
    strict: true,
  });
}

export async function runAssessment(argv: string[], io: CliIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    return usageError(io, err instanceof Error ? err.message : String(err));
  }

  const { values } = parsed;
  if (values.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  const format = values.format ?? "json";
  if (!isOutputFormat(format)) {
    return usageError(io, `Unknown format "${format}"; expected one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  if (values.sample && values.responses !== undefined) {
    return usageError(io, "Use either --responses or --sample, not both");
  }
  if (!values.sample && values.responses === undefined) {
    return usageError(io, "Missing --responses <file>");
  }

  try {
    let config = await loadAssessmentConfig(values.config, io.env);
    if (values.factors !== undefined) {
      config = withFactors(config, await loadFactors(values.factors));
    }

    const input: ResponseInput =
      values.responses !== undefined
        ? await loadResponses(values.responses)
        : { kind: "questionnaire", answers: SAMPLE_QUESTIONNAIRE };
    dlog("[cli] input", { kind: input.kind, factorCount: config.factors.length });

    const result = score(input, config);
    const output = formatResult(result, format, { generatedAt: (io.now ?? (() => new Date()))() });

    if (values.out !== undefined) {
      try {
        await writeFile(values.out, output, "utf8");
      } catch (err) {
        throw new FileAccessError(values.out, "could not be written", { cause: err });
      }
      dlog("[cli] wrote", { out: values.out, format });
    } else {
      io.stdout(output);
    }
    return EXIT_OK;
  } catch (err) {
    if (isValidationError(err)) {
      io.stderr(`${err.kind}${err.field ? ` [${err.field}]` : ""}: ${err.message}\n`);
      return EXIT_VALIDATION_ERROR;
    }
    if (err instanceof FileAccessError) {
      io.stderr(`${err.message}\n`);
      return EXIT_USAGE_ERROR;
    }
    throw err;
  }
}
