// Single import point for the project's data and configuration types

export * from "./telemetry.js";
export * from "./config.js";
