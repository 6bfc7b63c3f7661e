/**
 * Emitter module - record sinks for normalized batches
 * Includes MongoDB collections and NDJSON file/stream writers
 */
export * from "./types.js";
export * from "./ndjson-writer.js";
export * from "./ndjson-sink.js";
export * from "./mongo-sink.js";
