/**
 * JSON Schema of the configuration file
 */

const targetsSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    node: { type: "string", minLength: 1 },
    interface: { type: "string", minLength: 1 },
    address: { type: "string", minLength: 1 },
  },
} as const;

export const CONFIG_FILE_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    process: {
      type: "object",
      additionalProperties: false,
      properties: {
        inputPath: { type: "string" },
        concurrency: { type: "integer", minimum: 1 },
        sink: {
          type: "object",
          additionalProperties: false,
          properties: {
            type: { enum: ["ndjson", "stdout", "mongo"] },
            dir: { type: "string" },
            uri: { type: "string" },
            database: { type: "string" },
            targets: targetsSchema,
            batchSize: { type: "integer", minimum: 1 },
            writeConcern: { type: "string" },
            orderedInserts: { type: "boolean" },
          },
        },
        archive: {
          type: "object",
          additionalProperties: false,
          properties: {
            enabled: { type: "boolean" },
            dir: { type: "string" },
            mode: { enum: ["raw", "normalized"] },
          },
        },
        alerts: {
          type: "object",
          additionalProperties: false,
          properties: {
            file: { type: "string" },
          },
        },
      },
    },
    simulate: {
      type: "object",
      additionalProperties: false,
      properties: {
        messages: { type: "integer", minimum: 1 },
        nodes: { type: "integer", minimum: 1 },
        interfacesPerNode: { type: "integer", minimum: 1 },
        seed: { type: ["string", "integer"] },
        outputPath: { type: "string" },
      },
    },
  },
} as const;
