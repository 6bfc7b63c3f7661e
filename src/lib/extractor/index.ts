/**
 * Entry extractor - turns raw key/field entries into normalized records
 */

import type {
  BatchContext,
  FamilyRecordMap,
  RecordFamily,
} from "../../types/telemetry.js";
import type { EntriesExtraction, ExtractionOutcome } from "./types.js";
import { EXTRACTION_RULES } from "./rules.js";

export * from "./types.js";
export * from "./rules.js";

/**
 * Apply the rule of one family to a single entry
 */
export function extractEntry<F extends RecordFamily>(
  family: F,
  entry: unknown,
  batch: BatchContext,
): ExtractionOutcome<FamilyRecordMap[F]> {
  const rule = EXTRACTION_RULES[family];
  return rule(entry, batch);
}

/**
 * Apply the rule of one family to every entry of an item. Skipped entries are
 * only counted; they never stop their siblings.
 */
export function extractEntries<F extends RecordFamily>(
  family: F,
  entries: readonly unknown[],
  batch: BatchContext,
): EntriesExtraction<F> {
  const records: FamilyRecordMap[F][] = [];
  let skipped = 0;

  for (const entry of entries) {
    const outcome = extractEntry(family, entry, batch);
    if (outcome.kind === "record") {
      records.push(outcome.record);
    } else {
      skipped++;
    }
  }

  return { records, skipped };
}
