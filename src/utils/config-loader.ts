/**
 * Pipeline configuration loader
 *
 * Resolves the settings of a `process` run once, with precedence
 * CLI > config file > environment > defaults, so nothing downstream reads
 * process.env.
 */

import {
  DEFAULT_FAMILY_TARGETS,
  type ArchiveMode,
  type FamilyTargets,
  type PipelineConfig,
  type SinkConfig,
  type SinkType,
} from "../types/config.js";
import type {
  ProcessCommandOptions,
  ProcessConfigSection,
} from "../cli/config/types.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

export type Environment = Record<string, string | undefined>;

export const DEFAULTS = {
  inputPath: "stdin",
  concurrency: 1,
  sinkType: "ndjson",
  sinkDir: "./output",
  mongoDatabase: "telemetry",
  batchSize: 1000,
  writeConcern: "majority",
  archiveDir: "./archive",
  archiveMode: "raw",
} as const;

const SINK_TYPES: readonly SinkType[] = ["ndjson", "stdout", "mongo"];
const ARCHIVE_MODES: readonly ArchiveMode[] = ["raw", "normalized"];

function parseSinkType(value: string | undefined, source: string): SinkType | undefined {
  if (value === undefined) return undefined;
  const match = SINK_TYPES.find((type) => type === value);
  if (!match) {
    throw new ConfigError(`${source} must be one of ${SINK_TYPES.join(", ")}, got "${value}"`);
  }
  return match;
}

function parseArchiveMode(value: string | undefined, source: string): ArchiveMode | undefined {
  if (value === undefined) return undefined;
  const match = ARCHIVE_MODES.find((mode) => mode === value);
  if (!match) {
    throw new ConfigError(
      `${source} must be one of ${ARCHIVE_MODES.join(", ")}, got "${value}"`,
    );
  }
  return match;
}

function parseInteger(value: string | undefined, source: string): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${source} must be an integer, got "${value}"`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined, source: string): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new ConfigError(`${source} must be true or false, got "${value}"`);
}

/**
 * Read the `process` settings from environment variables
 */
export function readProcessEnvironment(env: Environment): ProcessConfigSection {
  return {
    inputPath: env.TELEMETRY_INPUT_PATH,
    concurrency: parseInteger(env.PIPELINE_CONCURRENCY, "PIPELINE_CONCURRENCY"),
    sink: {
      type: parseSinkType(env.SINK_TYPE, "SINK_TYPE"),
      dir: env.SINK_DIR,
      uri: env.MONGO_URI,
      database: env.MONGO_DATABASE,
      targets: {
        node: env.NODE_COLLECTION,
        interface: env.INTERFACE_COLLECTION,
        address: env.ADDRESS_COLLECTION,
      },
    },
    archive: {
      enabled: parseBoolean(env.ARCHIVE_ENABLED, "ARCHIVE_ENABLED"),
      dir: env.ARCHIVE_DIR,
      mode: parseArchiveMode(env.ARCHIVE_MODE, "ARCHIVE_MODE"),
    },
    alerts: {
      file: env.ALERTS_FILE,
    },
  };
}

/**
 * Convert commander options into a config section
 */
export function cliToSection(options: ProcessCommandOptions): ProcessConfigSection {
  return {
    inputPath: options.inputPath,
    concurrency: options.concurrency,
    sink: {
      type: parseSinkType(options.sink, "--sink"),
      dir: options.outputDir,
      uri: options.mongoUri,
      database: options.mongoDb,
      targets: {
        node: options.nodeTarget,
        interface: options.interfaceTarget,
        address: options.addressTarget,
      },
      batchSize: options.batchSize,
      writeConcern: options.writeConcern,
      orderedInserts: options.orderedInserts,
    },
    archive: {
      // Naming an archive directory on the command line turns archiving on
      enabled: options.archiveDir !== undefined ? true : undefined,
      dir: options.archiveDir,
      mode: parseArchiveMode(options.archiveMode, "--archive-mode"),
    },
    alerts: {
      file: options.alertsFile,
    },
  };
}

/**
 * First defined value, in precedence order
 */
function pick<T>(...values: Array<T | undefined>): T | undefined {
  return values.find((value) => value !== undefined);
}

type SinkSection = NonNullable<ProcessConfigSection["sink"]>;
type ArchiveSection = NonNullable<ProcessConfigSection["archive"]>;

function buildSinkConfig(
  type: SinkType,
  sinks: SinkSection[],
  targets: FamilyTargets,
): SinkConfig {
  switch (type) {
    case "ndjson":
      return {
        type: "ndjson",
        dir: pick(...sinks.map((s) => s.dir)) ?? DEFAULTS.sinkDir,
        targets,
      };
    case "stdout":
      return { type: "stdout", targets };
    case "mongo":
      return {
        type: "mongo",
        uri: pick(...sinks.map((s) => s.uri)) ?? "",
        database: pick(...sinks.map((s) => s.database)) ?? DEFAULTS.mongoDatabase,
        targets,
        batchSize: pick(...sinks.map((s) => s.batchSize)) ?? DEFAULTS.batchSize,
        writeConcern: pick(...sinks.map((s) => s.writeConcern)) ?? DEFAULTS.writeConcern,
        orderedInserts: pick(...sinks.map((s) => s.orderedInserts)) ?? false,
      };
  }
}

export interface ConfigSources {
  cli?: ProcessConfigSection;
  file?: ProcessConfigSection;
  env?: Environment;
}

/**
 * Merge every source into a complete pipeline configuration and validate it
 *
 * @example
 * const config = loadPipelineConfig({
 *   cli: { concurrency: 4 },
 *   file: { concurrency: 2, sink: { type: "stdout" } },
 * });
 * // concurrency 4 (CLI wins), stdout sink from the file
 */
export function loadPipelineConfig(sources: ConfigSources = {}): PipelineConfig {
  const layers: ProcessConfigSection[] = [
    sources.cli ?? {},
    sources.file ?? {},
    readProcessEnvironment(sources.env ?? {}),
  ];

  const sinks: SinkSection[] = layers.map((layer) => layer.sink ?? {});
  const archives: ArchiveSection[] = layers.map((layer) => layer.archive ?? {});

  const targets: FamilyTargets = {
    node: pick(...sinks.map((s) => s.targets?.node)) ?? DEFAULT_FAMILY_TARGETS.node,
    interface:
      pick(...sinks.map((s) => s.targets?.interface)) ?? DEFAULT_FAMILY_TARGETS.interface,
    address: pick(...sinks.map((s) => s.targets?.address)) ?? DEFAULT_FAMILY_TARGETS.address,
  };

  const sinkType = pick(...sinks.map((s) => s.type)) ?? DEFAULTS.sinkType;
  const sink = buildSinkConfig(sinkType, sinks, targets);

  const config: PipelineConfig = {
    inputPath: pick(...layers.map((l) => l.inputPath)) ?? DEFAULTS.inputPath,
    driver: {
      concurrency: pick(...layers.map((l) => l.concurrency)) ?? DEFAULTS.concurrency,
    },
    sink,
    archive: {
      enabled: pick(...archives.map((a) => a.enabled)) ?? false,
      dir: pick(...archives.map((a) => a.dir)) ?? DEFAULTS.archiveDir,
      mode: pick(...archives.map((a) => a.mode)) ?? DEFAULTS.archiveMode,
    },
    alerts: {
      file: pick(...layers.map((l) => l.alerts?.file)),
    },
  };

  validatePipelineConfig(config);

  logger.debug("Pipeline config loaded", {
    inputPath: config.inputPath,
    concurrency: config.driver.concurrency,
    sink: config.sink.type,
    archive: config.archive.enabled ? config.archive.mode : "disabled",
  });

  return config;
}

/**
 * Validate a resolved pipeline configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validatePipelineConfig(config: PipelineConfig): void {
  const { concurrency } = config.driver;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  if (config.inputPath.trim() === "") {
    throw new ConfigError("Input path must not be empty");
  }

  const { sink } = config;
  const names = [sink.targets.node, sink.targets.interface, sink.targets.address];
  if (new Set(names).size !== names.length) {
    throw new ConfigError(`Output targets must be distinct, got ${names.join(", ")}`);
  }

  if (sink.type === "mongo") {
    if (!sink.uri) {
      throw new ConfigError("A MongoDB URI is required for the mongo sink (--mongo-uri or MONGO_URI)");
    }
    if (!sink.database) {
      throw new ConfigError("A MongoDB database is required for the mongo sink");
    }
    if (!Number.isInteger(sink.batchSize) || sink.batchSize < 1) {
      throw new ConfigError(`Batch size must be a positive integer, got ${sink.batchSize}`);
    }
    if (sink.writeConcern !== "majority" && !/^\d+$/.test(sink.writeConcern)) {
      throw new ConfigError(
        `Write concern must be "majority" or a node count, got "${sink.writeConcern}"`,
      );
    }
  }
}
