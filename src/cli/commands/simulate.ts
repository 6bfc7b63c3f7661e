/**
 * Simulate CLI command - write synthetic device payloads as NDJSON messages
 */

import { Command } from "commander";
import { createWriteStream } from "fs";
import { mkdir } from "fs/promises";
import { dirname } from "path";
import { Readable, type Writable } from "stream";
import { pipeline } from "stream/promises";
import {
  DEFAULT_SIMULATOR_OPTIONS,
  simulateTelemetry,
  type SimulatorOptions,
} from "../../lib/simulator/index.js";
import { createNDJSONWriter } from "../../lib/emitter/ndjson-writer.js";
import { parseConfigFile } from "../config/parser.js";
import type { SimulateCommandOptions, SimulateConfigSection } from "../config/types.js";
import { ConfigError, exitCodeFor, toPipelineError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const parseIntOption = (value: string): number => parseInt(value, 10);

export interface SimulateConfig {
  messages: number;
  simulator: SimulatorOptions;
  seed?: string | number;
  outputPath: string;
}

function positiveInteger(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * CLI options over the config file's `simulate` section over defaults
 */
export function resolveSimulateConfig(
  options: SimulateCommandOptions,
  file: SimulateConfigSection = {},
): SimulateConfig {
  return {
    messages: positiveInteger(options.messages ?? file.messages ?? 10, "messages"),
    simulator: {
      nodes: positiveInteger(
        options.nodes ?? file.nodes ?? DEFAULT_SIMULATOR_OPTIONS.nodes,
        "nodes",
      ),
      interfacesPerNode: positiveInteger(
        options.interfacesPerNode ??
          file.interfacesPerNode ??
          DEFAULT_SIMULATOR_OPTIONS.interfacesPerNode,
        "interfacesPerNode",
      ),
    },
    seed: options.seed ?? file.seed,
    outputPath: options.outputPath ?? file.outputPath ?? "stdout",
  };
}

/**
 * Stream the simulated payloads, one per line, into the output
 */
export async function writeSimulatedTelemetry(
  config: SimulateConfig,
  output: Writable,
): Promise<number> {
  const writer = createNDJSONWriter();
  await pipeline(
    Readable.from(simulateTelemetry(config.messages, config.simulator, config.seed)),
    writer,
    output,
    // stdout must stay open for the process
    { end: output !== process.stdout },
  );
  return writer.lineCount;
}

export function createSimulateCommand(): Command {
  return new Command("simulate")
    .description("Generate synthetic device telemetry payloads as NDJSON messages")
    .option("--messages <number>", "Number of payloads to generate", parseIntOption)
    .option("--nodes <number>", "Nodes per payload", parseIntOption)
    .option("--interfaces-per-node <number>", "Interfaces per node", parseIntOption)
    .option("--seed <seed>", "Seed for deterministic generation")
    .option("--output-path <path>", 'Output path (or "stdout")')
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (options: SimulateCommandOptions) => {
      try {
        const fileConfig = options.config ? parseConfigFile(options.config).simulate : undefined;
        const config = resolveSimulateConfig(options, fileConfig);

        let output: Writable = process.stdout;
        if (config.outputPath !== "stdout") {
          await mkdir(dirname(config.outputPath), { recursive: true });
          output = createWriteStream(config.outputPath, { encoding: "utf8" });
        }

        const written = await writeSimulatedTelemetry(config, output);
        logger.info("Simulated telemetry written", {
          messages: written,
          outputPath: config.outputPath,
        });
      } catch (error) {
        const pipelineError = toPipelineError(error);
        console.error(JSON.stringify(pipelineError.toResponse("simulation"), null, 2));
        process.exitCode = exitCodeFor(pipelineError.code);
      }
    });
}
