/**
 * JSON Schema (draft-07) of a raw telemetry payload: an item, or arrays of
 * items nested to any depth
 */
export const TELEMETRY_PAYLOAD_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  $id: "telemetry-payload",
  definitions: {
    entry: {
      type: "object",
      required: ["keys"],
      properties: {
        keys: {
          type: "object",
          additionalProperties: { type: "string" },
        },
        fields: { type: "object" },
      },
    },
    item: {
      type: "object",
      required: ["path", "entries"],
      properties: {
        path: { type: "string", minLength: 1 },
        entries: {
          type: "array",
          items: { $ref: "#/definitions/entry" },
        },
      },
    },
    payload: {
      anyOf: [
        { $ref: "#/definitions/item" },
        { type: "array", items: { $ref: "#/definitions/payload" } },
      ],
    },
  },
  $ref: "#/definitions/payload",
} as const;
