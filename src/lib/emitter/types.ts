/**
 * Emitter module types
 */

import type { NormalizedBatch } from "../../types/telemetry.js";
import type { FamilyTargets } from "../../types/config.js";

export type OutputList = keyof FamilyTargets;

export const OUTPUT_LISTS: readonly OutputList[] = ["node", "interface", "address"];

/**
 * Stdout line shape: each record wrapped with the name of its target
 */
export interface TopicEnvelope {
  topic: string;
  record: unknown;
}

export function recordsFor(batch: NormalizedBatch, list: OutputList): readonly object[] {
  switch (list) {
    case "node":
      return batch.nodes;
    case "interface":
      return batch.interfaces;
    case "address":
      return batch.addresses;
  }
}
