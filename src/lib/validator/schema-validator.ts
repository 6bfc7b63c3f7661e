/**
 * Conformance checking of raw telemetry payloads using Ajv
 */

import AjvModule from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import { TELEMETRY_PAYLOAD_SCHEMA } from "./telemetry-schema.js";
import type { InboundMessage } from "../pipeline/types.js";

// ajv ships CommonJS; under ESM the class is the default export's `default`
const Ajv = AjvModule.default;

export interface SchemaViolation {
  offset: number;
  errors: Array<{ path: string; message: string }>;
}

export interface ConformanceReport {
  totalMessages: number;
  validMessages: number;
  invalidMessages: number;
  conformanceRate: number;
  violations: SchemaViolation[];
}

export function describeErrors(
  errors: ErrorObject[] | null | undefined,
): SchemaViolation["errors"] {
  if (!errors) return [];
  return errors.map((error) => {
    // For missing required properties, Ajv puts the field name in params
    const missing = error.keyword === "required" ? error.params.missingProperty : undefined;
    const path =
      typeof missing === "string"
        ? `${error.instancePath}/${missing}`
        : error.instancePath || error.schemaPath;
    return {
      path,
      message: `${error.message ?? "invalid"} (keyword: ${error.keyword})`,
    };
  });
}

/**
 * Checks payloads against the raw telemetry schema. Extraction never depends
 * on this; it is a diagnostic for producers.
 */
export class TelemetrySchemaValidator {
  private readonly validateFn: ValidateFunction;

  constructor(private readonly maxViolations: number = 100) {
    const ajv = new Ajv({
      strict: false,
      allErrors: true,
    });
    this.validateFn = ajv.compile(TELEMETRY_PAYLOAD_SCHEMA);
  }

  validate(payload: unknown): boolean {
    return this.validateFn(payload);
  }

  getErrors(): SchemaViolation["errors"] {
    return describeErrors(this.validateFn.errors);
  }

  /**
   * Validate every message of a source and build a conformance report
   */
  async validateAll(messages: AsyncIterable<InboundMessage>): Promise<ConformanceReport> {
    let totalMessages = 0;
    let validMessages = 0;
    const violations: SchemaViolation[] = [];

    for await (const { offset, payload } of messages) {
      totalMessages++;
      if (this.validate(payload)) {
        validMessages++;
      } else if (violations.length < this.maxViolations) {
        violations.push({ offset, errors: this.getErrors() });
      }
    }

    return {
      totalMessages,
      validMessages,
      invalidMessages: totalMessages - validMessages,
      conformanceRate: totalMessages > 0 ? validMessages / totalMessages : 1,
      violations,
    };
  }
}
