/**
 * Per-family extraction rules. Each rule checks its required keys and applies
 * the family's defaults; a defective entry is skipped, never thrown on.
 */

import type {
  AddressRecord,
  BatchContext,
  CounterValue,
  InterfaceStatisticsRecord,
  InterfaceStatusRecord,
  JsonObject,
  JsonValue,
  NodeRecord,
} from "../../types/telemetry.js";
import type { ExtractionOutcome, ExtractionRules, SkipReason } from "./types.js";

interface EntryParts {
  keys: Record<string, unknown>;
  fields: JsonObject;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : isPlainObject(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Keep the JSON-representable fields; anything else was not decoded from JSON
 */
function toFields(value: unknown): JsonObject {
  if (!isPlainObject(value)) return {};
  const entries: [string, JsonValue][] = [];
  for (const [name, fieldValue] of Object.entries(value)) {
    if (isJsonValue(fieldValue)) {
      entries.push([name, fieldValue]);
    }
  }
  // fromEntries defines own properties, so a "__proto__" field stays a field
  return Object.fromEntries(entries);
}

function splitEntry(entry: unknown): EntryParts | SkipReason {
  if (!isPlainObject(entry)) return "entry-not-an-object";
  const keys = entry.keys;
  if (!isPlainObject(keys)) return "missing-keys";
  return { keys, fields: toFields(entry.fields) };
}

/** Required keys must be non-empty strings */
function requiredKey(keys: Record<string, unknown>, name: string): string | undefined {
  const value = keys[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}

function optionalKey(keys: Record<string, unknown>, name: string): string {
  const value = keys[name];
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

/** Absent and null fields are missing */
function presentField(fields: JsonObject, name: string): JsonValue | undefined {
  if (!Object.hasOwn(fields, name)) return undefined;
  return fields[name] ?? undefined;
}

function textField(fields: JsonObject, name: string): string {
  const value = presentField(fields, name);
  if (value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function counterField(fields: JsonObject, name: string): CounterValue {
  const value = presentField(fields, name);
  if (value === undefined) return 0;
  if (typeof value === "number") return value;

  const text = textField(fields, name);
  const numeric = Number(text);
  if (text.trim() === "" || !Number.isFinite(numeric)) return text;
  // Integers past 2^53 stay text rather than lose digits
  if (Number.isInteger(numeric) && !Number.isSafeInteger(numeric)) return text;
  return numeric;
}

function skip(reason: SkipReason): { kind: "skip"; reason: SkipReason } {
  return { kind: "skip", reason };
}

function emit<T>(record: T): ExtractionOutcome<T> {
  Object.freeze(record);
  return { kind: "record", record };
}

export function extractNodeEntry(
  entry: unknown,
  batch: BatchContext,
): ExtractionOutcome<NodeRecord> {
  const parts = splitEntry(entry);
  if (typeof parts === "string") return skip(parts);

  const nodeName = requiredKey(parts.keys, "node_name");
  if (!nodeName) return skip("missing-node-name");

  // Fixed keys are applied last so every record keeps the batch correlation
  return emit({
    ...parts.fields,
    node_name: nodeName,
    batch_id: batch.batchId,
    timestamp: batch.timestamp,
  });
}

function interfaceKeys(
  parts: EntryParts,
): { nodeName: string; interfaceName: string } | SkipReason {
  const nodeName = requiredKey(parts.keys, "node_name");
  if (!nodeName) return "missing-node-name";
  const interfaceName = requiredKey(parts.keys, "interface_name");
  if (!interfaceName) return "missing-interface-name";
  return { nodeName, interfaceName };
}

export function extractInterfaceStatusEntry(
  entry: unknown,
  batch: BatchContext,
): ExtractionOutcome<InterfaceStatusRecord> {
  const parts = splitEntry(entry);
  if (typeof parts === "string") return skip(parts);
  const ids = interfaceKeys(parts);
  if (typeof ids === "string") return skip(ids);

  return emit({
    node_name: ids.nodeName,
    interface_name: ids.interfaceName,
    batch_id: batch.batchId,
    timestamp: batch.timestamp,
    admin_status: textField(parts.fields, "admin_status"),
    oper_status: textField(parts.fields, "oper_status"),
  });
}

export function extractInterfaceStatisticsEntry(
  entry: unknown,
  batch: BatchContext,
): ExtractionOutcome<InterfaceStatisticsRecord> {
  const parts = splitEntry(entry);
  if (typeof parts === "string") return skip(parts);
  const ids = interfaceKeys(parts);
  if (typeof ids === "string") return skip(ids);

  const { fields } = parts;
  return emit({
    node_name: ids.nodeName,
    interface_name: ids.interfaceName,
    batch_id: batch.batchId,
    timestamp: batch.timestamp,
    in_octets: counterField(fields, "in_octets"),
    out_octets: counterField(fields, "out_octets"),
    in_packets: counterField(fields, "in_packets"),
    out_packets: counterField(fields, "out_packets"),
    in_errors: counterField(fields, "in_errors"),
    out_errors: counterField(fields, "out_errors"),
  });
}

export function extractAddressEntry(
  entry: unknown,
  batch: BatchContext,
): ExtractionOutcome<AddressRecord> {
  const parts = splitEntry(entry);
  if (typeof parts === "string") return skip(parts);

  const { keys, fields } = parts;
  const nodeName = requiredKey(keys, "node_name");
  if (!nodeName) return skip("missing-node-name");
  const interfaceName = requiredKey(keys, "interface_name");
  if (!interfaceName) return skip("missing-interface-name");
  // Devices report the prefix under a hyphenated key
  const prefix = requiredKey(keys, "address_ip-prefix");
  if (!prefix) return skip("missing-address-prefix");

  return emit({
    node_name: nodeName,
    interface_name: interfaceName,
    subinterface_index: optionalKey(keys, "subinterface_index"),
    address_ip_prefix: prefix,
    batch_id: batch.batchId,
    timestamp: batch.timestamp,
    origin: textField(fields, "origin"),
    status: textField(fields, "status"),
  });
}

export const EXTRACTION_RULES: ExtractionRules = {
  node: extractNodeEntry,
  "interface-status": extractInterfaceStatusEntry,
  "interface-statistics": extractInterfaceStatisticsEntry,
  address: extractAddressEntry,
};
