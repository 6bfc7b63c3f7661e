/**
 * Extract CLI command - run one extraction over a single JSON payload file
 */

import { Command } from "commander";
import { readFile, writeFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { extractTelemetry, type ExtractionResult } from "../../lib/parser/index.js";
import type { ExtractCommandOptions } from "../config/types.js";
import {
  exitCodeFor,
  FileIOError,
  InputReadError,
  toPipelineError,
  type ErrorResponse,
} from "../../utils/errors.js";

export interface ExtractionResponse {
  status: "success";
  phase: "extraction";
  batch_id: string;
  timestamp: string;
  nodes: ExtractionResult["nodes"];
  interfaces: ExtractionResult["interfaces"];
  addresses: ExtractionResult["addresses"];
}

/**
 * Shape an extraction result for CLI output
 */
export function toExtractionResponse(result: ExtractionResult): ExtractionResponse | ErrorResponse {
  if (!result.ok) {
    return result.error.toResponse("extraction");
  }
  return {
    status: "success",
    phase: "extraction",
    batch_id: result.batchId,
    timestamp: result.timestamp,
    nodes: result.nodes,
    interfaces: result.interfaces,
    addresses: result.addresses,
  };
}

export async function loadPayloadFile(inputPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(inputPath, "utf8");
  } catch (error) {
    throw new FileIOError(`Payload not found at: ${inputPath}`, { inputPath }, { cause: error });
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new InputReadError(`Payload is not valid JSON: ${inputPath}`, { inputPath }, {
      cause: error,
    });
  }
}

export function createExtractCommand(): Command {
  return new Command("extract")
    .description("Extract node, interface and address records from one JSON payload")
    .requiredOption("--input-path <path>", "Path to a JSON telemetry payload")
    .option("--output-path <path>", "Path for the extraction result (default: stdout)")
    .option("--pretty", "Indent the JSON output", false)
    .action(async (options: ExtractCommandOptions) => {
      try {
        const payload = await loadPayloadFile(options.inputPath);
        const result = extractTelemetry(payload);
        const response = toExtractionResponse(result);
        const output = JSON.stringify(response, null, options.pretty ? 2 : undefined);

        if (options.outputPath && options.outputPath !== "stdout") {
          await mkdir(dirname(options.outputPath), { recursive: true });
          await writeFile(options.outputPath, output + "\n", "utf8");
          console.error(`Extraction result written to: ${options.outputPath}`);
        } else {
          console.log(output);
        }

        process.exitCode = result.ok ? 0 : 1;
      } catch (error) {
        const pipelineError = toPipelineError(error);
        console.error(JSON.stringify(pipelineError.toResponse("extraction"), null, 2));
        process.exitCode = exitCodeFor(pipelineError.code);
      }
    });
}
