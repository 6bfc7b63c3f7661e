/**
 * Network telemetry pipeline: classify hierarchical device telemetry into
 * node, interface and address records
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Extraction core
export * from "./lib/classifier/index.js";
export * from "./lib/extractor/index.js";
export * from "./lib/flattener/index.js";
export * from "./lib/correlator/index.js";
export * from "./lib/parser/index.js";

// Pipeline and collaborators
export * from "./lib/pipeline/index.js";
export * from "./lib/source/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/archive/index.js";
export * from "./lib/alerts/index.js";
export * from "./lib/validator/index.js";
export * from "./lib/simulator/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
export * from "./utils/seed-manager.js";
