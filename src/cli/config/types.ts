/**
 * CLI configuration types
 */

import type { ArchiveMode, FamilyTargets, SinkType } from "../../types/config.js";

/**
 * `process` section of a config file; everything optional
 */
export interface ProcessConfigSection {
  inputPath?: string;
  concurrency?: number;
  sink?: {
    type?: SinkType;
    dir?: string;
    uri?: string;
    database?: string;
    targets?: Partial<FamilyTargets>;
    batchSize?: number;
    writeConcern?: string;
    orderedInserts?: boolean;
  };
  archive?: {
    enabled?: boolean;
    dir?: string;
    mode?: ArchiveMode;
  };
  alerts?: {
    file?: string;
  };
}

/**
 * `simulate` section of a config file
 */
export interface SimulateConfigSection {
  messages?: number;
  nodes?: number;
  interfacesPerNode?: number;
  seed?: string | number;
  outputPath?: string;
}

/**
 * Complete configuration file structure
 */
export interface TelemetryConfigFile {
  process?: ProcessConfigSection;
  simulate?: SimulateConfigSection;
}

/**
 * CLI command options (from commander)
 */
export interface ProcessCommandOptions {
  inputPath?: string;
  concurrency?: number;
  sink?: string;
  outputDir?: string;
  mongoUri?: string;
  mongoDb?: string;
  nodeTarget?: string;
  interfaceTarget?: string;
  addressTarget?: string;
  batchSize?: number;
  writeConcern?: string;
  orderedInserts?: boolean;
  archiveDir?: string;
  archiveMode?: string;
  alertsFile?: string;
  config?: string;
}

export interface ExtractCommandOptions {
  inputPath: string;
  outputPath?: string;
  pretty: boolean;
}

export interface ValidateCommandOptions {
  inputPath: string;
  outputPath?: string;
  maxViolations: number;
}

export interface SimulateCommandOptions {
  messages?: number;
  nodes?: number;
  interfacesPerNode?: number;
  seed?: string;
  outputPath?: string;
  config?: string;
}
