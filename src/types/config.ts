/**
 * Configuration types for the telemetry pipeline
 */

export type SinkType = "ndjson" | "stdout" | "mongo";

export type ArchiveMode = "raw" | "normalized";

/**
 * Destination name per output list (file stem or collection name)
 */
export interface FamilyTargets {
  node: string;
  interface: string;
  address: string;
}

export interface NDJSONSinkConfig {
  type: "ndjson";
  dir: string;
  targets: FamilyTargets;
}

export interface StdoutSinkConfig {
  type: "stdout";
  targets: FamilyTargets;
}

export interface MongoSinkConfig {
  type: "mongo";
  uri: string;
  database: string;
  targets: FamilyTargets;
  batchSize: number;
  writeConcern: string;
  orderedInserts: boolean;
}

export type SinkConfig = NDJSONSinkConfig | StdoutSinkConfig | MongoSinkConfig;

export interface ArchiveConfig {
  enabled: boolean;
  dir: string;
  mode: ArchiveMode;
}

export interface AlertsConfig {
  file?: string;
}

/**
 * Settings the pipeline driver is constructed with
 */
export interface DriverConfig {
  /** Messages processed at once; 1 keeps strict source order */
  concurrency: number;
}

export interface PipelineConfig {
  inputPath: string;
  driver: DriverConfig;
  sink: SinkConfig;
  archive: ArchiveConfig;
  alerts: AlertsConfig;
}

export const DEFAULT_FAMILY_TARGETS: FamilyTargets = {
  node: "node-data",
  interface: "interface-data",
  address: "address-data",
};
