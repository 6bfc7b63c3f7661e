/**
 * Entry extractor types
 */

import type {
  BatchContext,
  FamilyRecordMap,
  RecordFamily,
} from "../../types/telemetry.js";

export type SkipReason =
  | "entry-not-an-object"
  | "missing-keys"
  | "missing-node-name"
  | "missing-interface-name"
  | "missing-address-prefix";

/**
 * Result-or-skip outcome of applying one extraction rule to one entry
 */
export type ExtractionOutcome<T> =
  | { kind: "record"; record: T }
  | { kind: "skip"; reason: SkipReason };

export type ExtractionRule<F extends RecordFamily> = (
  entry: unknown,
  batch: BatchContext,
) => ExtractionOutcome<FamilyRecordMap[F]>;

export type ExtractionRules = { [F in RecordFamily]: ExtractionRule<F> };

export interface EntriesExtraction<F extends RecordFamily> {
  records: FamilyRecordMap[F][];
  skipped: number;
}
