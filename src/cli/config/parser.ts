/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import AjvModule from "ajv";
import type { TelemetryConfigFile } from "./types.js";
import { CONFIG_FILE_SCHEMA } from "./schema.js";
import { describeErrors } from "../../lib/validator/schema-validator.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const Ajv = AjvModule.default;
const validateConfigFile = new Ajv({ allErrors: true, strict: false }).compile<TelemetryConfigFile>(
  CONFIG_FILE_SCHEMA,
);

/**
 * Check a decoded config document against the config file schema
 */
export function toConfigFile(document: unknown, filePath: string): TelemetryConfigFile {
  // An empty YAML file parses to null
  const candidate = document ?? {};
  if (!validateConfigFile(candidate)) {
    throw new ConfigError(`Invalid config file: ${filePath}`, {
      errors: describeErrors(validateConfigFile.errors),
    });
  }
  return candidate;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): TelemetryConfigFile {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const config = toConfigFile(document, filePath);
  logger.info("Configuration file parsed successfully", {
    hasProcessConfig: !!config.process,
    hasSimulateConfig: !!config.simulate,
  });
  return config;
}
