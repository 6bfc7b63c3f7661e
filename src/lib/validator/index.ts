/**
 * Validator module - JSON Schema conformance of raw telemetry
 */
export * from "./telemetry-schema.js";
export * from "./schema-validator.js";
