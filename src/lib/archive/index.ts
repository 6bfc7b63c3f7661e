/**
 * Archive module - durable per-batch side copies
 */
export * from "./file-exporter.js";
