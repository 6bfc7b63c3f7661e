/**
 * Validate CLI command - check NDJSON telemetry messages against the raw
 * payload schema
 */

import { Command } from "commander";
import { writeFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { TelemetrySchemaValidator, type ConformanceReport } from "../../lib/validator/index.js";
import { openNDJSONSource } from "../../lib/source/ndjson-source.js";
import type { ValidateCommandOptions } from "../config/types.js";
import { exitCodeFor, toPipelineError, ValidationError } from "../../utils/errors.js";

const parseIntOption = (value: string): number => parseInt(value, 10);

export interface ValidationResponse {
  status: "success";
  phase: "validation";
  report: ConformanceReport & { overallPassed: boolean };
}

export function toValidationResponse(report: ConformanceReport): ValidationResponse {
  return {
    status: "success",
    phase: "validation",
    report: {
      ...report,
      overallPassed: report.invalidMessages === 0,
    },
  };
}

/**
 * Validate every message of an NDJSON input. An input without messages is an error.
 */
export async function runValidation(
  inputPath: string,
  maxViolations: number,
): Promise<ValidationResponse> {
  if (!Number.isInteger(maxViolations) || maxViolations < 0) {
    throw new ValidationError(`Max violations must be a non-negative integer, got ${maxViolations}`);
  }
  const validator = new TelemetrySchemaValidator(maxViolations);
  const report = await validator.validateAll(openNDJSONSource(inputPath));

  if (report.totalMessages === 0) {
    throw new ValidationError("No messages found in input", { inputPath });
  }
  return toValidationResponse(report);
}

export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Check NDJSON telemetry messages against the raw payload schema")
    .requiredOption("--input-path <path>", 'Path to NDJSON file to validate (or "stdin")')
    .option("--output-path <path>", "Path for validation report JSON (default: stdout)")
    .option("--max-violations <number>", "Violations kept in the report", parseIntOption, 100)
    .action(async (options: ValidateCommandOptions) => {
      try {
        const response = await runValidation(options.inputPath, options.maxViolations);
        const output = JSON.stringify(response, null, 2);

        if (options.outputPath && options.outputPath !== "stdout") {
          await mkdir(dirname(options.outputPath), { recursive: true });
          await writeFile(options.outputPath, output, "utf8");
          console.error(`Validation report written to: ${options.outputPath}`);
        } else {
          console.log(output);
        }

        process.exitCode = response.report.overallPassed ? 0 : 1;
      } catch (error) {
        const pipelineError = toPipelineError(error);
        console.error(JSON.stringify(pipelineError.toResponse("validation"), null, 2));
        process.exitCode = exitCodeFor(pipelineError.code);
      }
    });
}
