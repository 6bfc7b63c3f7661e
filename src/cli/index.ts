#!/usr/bin/env node

/**
 * nettel CLI - classify and normalize network device telemetry
 */

import { Command } from "commander";
import { createProcessCommand } from "./commands/process.js";
import { createExtractCommand } from "./commands/extract.js";
import { createValidateCommand } from "./commands/validate.js";
import { createSimulateCommand } from "./commands/simulate.js";
import { isLogLevel, logger } from "../utils/logger.js";
import { ConfigError, exitCodeFor, toPipelineError } from "../utils/errors.js";

const pkg = {
  name: "nettel",
  version: "0.1.0",
  description: "Classify hierarchical network telemetry into node, interface and address records",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (level === undefined) return;
      if (!isLogLevel(level)) {
        throw new ConfigError(`Unknown log level: ${String(level)}`);
      }
      logger.setLevel(level);
    });

  program.addCommand(createProcessCommand());
  program.addCommand(createExtractCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createSimulateCommand());

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const pipelineError = toPipelineError(error);
  logger.error("Unexpected error", { error: pipelineError.message });
  console.error(JSON.stringify(pipelineError.toResponse("cli"), null, 2));
  process.exit(exitCodeFor(pipelineError.code));
});
