export * from "./ndjson-source.js";
