/**
 * Payload flattener - walks arbitrarily nested payloads and extracts every
 * telemetry item it reaches
 */

import type {
  AddressRecord,
  BatchContext,
  InterfaceRecord,
  NodeRecord,
} from "../../types/telemetry.js";
import { classifyPath } from "../classifier/index.js";
import { extractEntries } from "../extractor/index.js";

export type OtherReason = "not-a-mapping" | "missing-entries" | "entries-not-a-list";

/**
 * Closed set of payload node variants
 */
export type PayloadNode =
  | { kind: "sequence"; elements: readonly unknown[] }
  | { kind: "item"; path: string; entries: readonly unknown[] }
  | { kind: "other"; reason: OtherReason };

export type TelemetryItemNode = Extract<PayloadNode, { kind: "item" }>;

export interface FlattenResult {
  nodes: NodeRecord[];
  interfaces: InterfaceRecord[];
  addresses: AddressRecord[];
  stats: FlattenStats;
}

export interface FlattenStats {
  items: number;
  ignored: number;
  skippedEntries: number;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled payload node: ${JSON.stringify(value)}`);
}

/**
 * Decide which variant a decoded JSON value is
 */
export function toPayloadNode(value: unknown): PayloadNode {
  if (Array.isArray(value)) {
    return { kind: "sequence", elements: value };
  }
  if (typeof value !== "object" || value === null) {
    return { kind: "other", reason: "not-a-mapping" };
  }
  if (!("entries" in value)) {
    return { kind: "other", reason: "missing-entries" };
  }
  const { entries } = value;
  if (!Array.isArray(entries)) {
    return { kind: "other", reason: "entries-not-a-list" };
  }
  const path = "path" in value && typeof value.path === "string" ? value.path : "";
  return { kind: "item", path, entries };
}

/**
 * Visit every telemetry item reachable from the payload, depth first and in
 * document order. Returns how many non-item leaves were ignored.
 */
export function walkPayload(
  payload: unknown,
  onItem: (item: TelemetryItemNode) => void,
): number {
  const node = toPayloadNode(payload);
  switch (node.kind) {
    case "sequence": {
      let ignored = 0;
      for (const element of node.elements) {
        ignored += walkPayload(element, onItem);
      }
      return ignored;
    }
    case "item":
      onItem(node);
      return 0;
    case "other":
      return 1;
    default:
      return assertNever(node);
  }
}

/**
 * Flatten a payload into the three output lists, stamping every record with
 * the given batch. Throws only on failures outside the per-entry rules.
 */
export function flattenPayload(payload: unknown, batch: BatchContext): FlattenResult {
  const nodes: NodeRecord[] = [];
  const interfaces: InterfaceRecord[] = [];
  const addresses: AddressRecord[] = [];
  const stats: FlattenStats = { items: 0, ignored: 0, skippedEntries: 0 };

  stats.ignored = walkPayload(payload, (item) => {
    stats.items++;
    for (const family of classifyPath(item.path)) {
      switch (family) {
        case "node": {
          const { records, skipped } = extractEntries(family, item.entries, batch);
          nodes.push(...records);
          stats.skippedEntries += skipped;
          break;
        }
        case "interface-status":
        case "interface-statistics": {
          const { records, skipped } = extractEntries(family, item.entries, batch);
          interfaces.push(...records);
          stats.skippedEntries += skipped;
          break;
        }
        case "address": {
          const { records, skipped } = extractEntries(family, item.entries, batch);
          addresses.push(...records);
          stats.skippedEntries += skipped;
          break;
        }
        default:
          assertNever(family);
      }
    }
  });

  return { nodes, interfaces, addresses, stats };
}
