#!/usr/bin/env node
import { runAssessment } from "./runAssessment";
import { derr } from "../lib/debug";

void runAssessment(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    derr("[cli] unexpected error", err);
    process.stderr.write(`Unexpected error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 3;
  });
